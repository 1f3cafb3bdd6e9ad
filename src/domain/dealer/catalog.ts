// MCP prompt catalog: reusable instructions that tell the calling model which
// tools to chain for a given investigation.

export interface PromptArgumentEntry {
  name: string;
  description: string;
  required: boolean;
}

export interface PromptEntry {
  name: string;
  description: string;
  arguments: PromptArgumentEntry[];
}

export interface RenderedPrompt {
  description: string;
  text: string;
}

export const PROMPTS: readonly PromptEntry[] = [
  {
    name: "investigate_dealer",
    description: "Investigação completa de lojista suspeito de fraude",
    arguments: [
      { name: "cnpj", description: "CNPJ do lojista a ser investigado", required: true },
      { name: "company_name", description: "Nome da empresa (opcional, melhora a busca)", required: false },
      { name: "concern", description: "Motivo da suspeita ou preocupação específica", required: false },
    ],
  },
  {
    name: "pre_purchase_check",
    description: "Verificação rápida antes de comprar veículo",
    arguments: [
      { name: "cnpj", description: "CNPJ do lojista", required: true },
      { name: "vehicle_info", description: "Informações sobre o veículo (opcional)", required: false },
    ],
  },
];

function investigateDealer(args: Record<string, string>): RenderedPrompt {
  const cnpj = args.cnpj ?? "";
  const concern = args.concern || "possível fraude";
  const companyName = args.company_name || "A investigar";

  return {
    description: `Investigação completa de fraude para lojista CNPJ ${cnpj}`,
    text: `
Você é especialista em detecção de fraude comercial no Brasil. Investigue o lojista/concessionária com CNPJ ${cnpj} por suspeita de ${concern}.

INSTRUÇÕES:
1. Use comprehensive_dealer_check para a análise completa
2. Use ferramentas específicas adicionais se necessário
3. Analise criticamente todos os dados coletados
4. Identifique padrões suspeitos e red flags
5. Dê uma recomendação clara e fundamentada

VERIFIQUE:
- Situação legal atual (CNPJ ativo, processos)
- Histórico de reclamações e fraudes
- Reputação online e offline
- Credibilidade comercial no setor

FORMATO DA RESPOSTA:
- **Resumo Executivo**
- **Red Flags Encontrados**
- **Nível de Risco**: BAIXO/MÉDIO/ALTO/CRÍTICO
- **Recomendação**
- **Próximos Passos**

Nome da empresa: ${companyName}

Seja rigoroso e priorize a proteção do consumidor.
`,
  };
}

function prePurchaseCheck(args: Record<string, string>): RenderedPrompt {
  const cnpj = args.cnpj ?? "";
  const vehicleContext = args.vehicle_info
    ? ` para compra do veículo: ${args.vehicle_info}`
    : " para compra de veículo";

  return {
    description: `Verificação pré-compra para lojista CNPJ ${cnpj}`,
    text: `
Faça uma verificação rápida de segurança do lojista CNPJ ${cnpj}${vehicleContext}.

VERIFICAÇÕES ESSENCIAIS:
1. Use verify_cnpj_status para confirmar se a empresa está ativa
2. Use check_dealer_reputation para checar reclamações básicas
3. Identifique red flags críticos que impeçam a compra

RESPONDA APENAS:
✅ PROSSEGUIR - sem impedimentos críticos
⚠️ CAUTELA - alertas que pedem atenção
🚫 EVITAR - problemas graves

Inclua o motivo principal, o principal alerta (se houver) e uma ação imediata.
Esta é uma verificação PRÉ-COMPRA rápida: seja direto e prático.
`,
  };
}

const RENDERERS: Record<string, (args: Record<string, string>) => RenderedPrompt> = {
  investigate_dealer: investigateDealer,
  pre_purchase_check: prePurchaseCheck,
};

/**
 * Render a catalog prompt.
 *
 * @throws Error for an unknown prompt name
 */
export function renderPrompt(
  name: string,
  args: Record<string, string> = {},
): RenderedPrompt {
  const render = RENDERERS[name];
  if (!render) {
    throw new Error(`Prompt not found: ${name}`);
  }
  return render(args);
}
