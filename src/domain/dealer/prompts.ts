// ============================================================================
// Model Instructions
// ============================================================================

export const SYSTEM_PROMPT = `Você é um especialista em investigação de empresas brasileiras e em detecção de fraudes no comércio de veículos, com acesso a busca web.

CAPACIDADES:
- Busca em tempo real sobre empresas brasileiras
- Dados públicos de CNPJ (Receita Federal), Reclame Aqui e avaliações online
- Processos judiciais, investigações e sanções
- Notícias e reportagens recentes

REGRAS DE RESPOSTA:
1. Busque informações ATUALIZADAS e REAIS sobre a empresa
2. Seja ESPECÍFICO: datas, valores e números concretos quando existirem
3. Responda SEMPRE com JSON válido e completo
4. Campos sem informação: use "N/A" ou listas vazias []
5. Liste as FONTES consultadas
6. Descreva com precisão os problemas e riscos encontrados`;

export const SEARCH_INSTRUCTIONS = `
Faça uma ANÁLISE COMPLETA usando busca web para obter:
- Dados oficiais e atualizados da empresa
- Reclamações recentes em sites de consumidores
- Processos judiciais e investigações
- Notícias e reportagens sobre a empresa
- Avaliações e reputação online

IMPORTANTE: responda EXCLUSIVAMENTE com JSON válido, sem texto adicional.`;

export const FALLBACK_INSTRUCTIONS = `
Sem busca web disponível, baseie a análise em:
- Padrões típicos de empresas do setor automotivo brasileiro
- Problemas comuns em lojistas de veículos
- Indicadores de risco no comércio de automóveis

Responda com JSON REALISTA e DETALHADO seguindo exatamente a estrutura pedida.`;

// ============================================================================
// Check Prompts
// ============================================================================

export function buildCnpjStatusPrompt(formattedCnpj: string): string {
  return `
Verifique a situação oficial do CNPJ ${formattedCnpj} como lojista de veículos.

CONSULTAR:
• Situação na Receita Federal (ativa/inativa, CNAE)
• Dados da empresa (razão social, endereço, sócios)
• Porte e capital social
• Compatibilidade do CNAE com comércio de veículos
• Tempo de atividade

RETORNE JSON:
{
  "cnpj": "${formattedCnpj}",
  "razao_social": "razão social oficial",
  "nome_fantasia": "nome fantasia",
  "situacao_cadastral": "ATIVA/BAIXADA/SUSPENSA",
  "data_abertura": "DD/MM/AAAA",
  "atividade_principal": "CNAE e descrição",
  "capital_social": "valor ou N/A",
  "endereco": "endereço da empresa",
  "socios": ["sócio 1", "sócio 2"],
  "porte_empresa": "microempresa/pequena/média/grande",
  "anos_funcionamento": "tempo em anos",
  "adequacao_cnae": "sim/não - se o CNAE é compatível com veículos",
  "red_flags": ["problema identificado 1"],
  "status_summary": "resumo da situação"
}
`;
}

function searchTerms(formattedCnpj: string, companyName?: string): string {
  return companyName ? `CNPJ ${formattedCnpj} "${companyName}"` : `CNPJ ${formattedCnpj}`;
}

export function buildReputationPrompt(formattedCnpj: string, companyName?: string): string {
  return `
Analise a reputação da empresa ${searchTerms(formattedCnpj, companyName)} como lojista/concessionária de veículos.

BUSCAR:
• Reclamações de clientes (Reclame Aqui, Google Reviews)
• Problemas com veículos (documentação, garantias, fraudes)
• Perfil da empresa (porte, segmento, estrutura)
• Indicadores de risco ou de confiabilidade

RETORNE JSON:
{
  "cnpj": "${formattedCnpj}",
  "company_name": "nome da empresa",
  "reputation_summary": "resumo da reputação",
  "reclame_aqui_score": "nota ou N/A",
  "google_rating": "avaliação ou N/A",
  "complaint_count": "número de reclamações ou N/A",
  "main_issues": ["problema1", "problema2"],
  "business_size": "pequena/média/grande ou N/A",
  "red_flags": ["alerta1", "alerta2"],
  "reputation_score": "0-100",
  "sources_checked": ["fonte1", "fonte2"]
}
`;
}

export function buildLegalIssuesPrompt(formattedCnpj: string, companyName?: string): string {
  return `
Busque questões legais da empresa ${searchTerms(formattedCnpj, companyName)} como lojista de veículos.

VERIFICAR:
• Processos judiciais (criminais, cíveis, trabalhistas)
• Investigações do Ministério Público
• Multas e sanções (Procon, DETRAN, Receita)
• Fraudes ligadas a veículos (documentação, estelionato)
• Operações policiais ou reportagens investigativas

RETORNE JSON:
{
  "cnpj": "${formattedCnpj}",
  "company_name": "nome da empresa",
  "legal_summary": "resumo das questões legais",
  "criminal_cases": ["processo criminal 1"],
  "civil_cases": ["processo cível 1"],
  "investigations": ["investigação 1"],
  "sanctions": ["multa/sanção 1"],
  "fraud_indicators": ["indicador de fraude 1"],
  "risk_level": "BAIXO/MÉDIO/ALTO/CRÍTICO",
  "sources_found": ["fonte consultada 1"]
}
`;
}

export const IMAGE_SLOTS = ['facade', 'logo', 'interior', 'staff', 'vehicles', 'location'] as const;

const IMAGE_SLOT_DESCRIPTIONS: Record<(typeof IMAGE_SLOTS)[number], string> = {
  facade: 'fachada da loja',
  logo: 'logotipo',
  interior: 'interior/showroom',
  staff: 'equipe',
  vehicles: 'veículos em exposição',
  location: 'vista do local/endereço',
};

export function buildBusinessImagesPrompt(formattedCnpj: string, companyName?: string): string {
  const slots = IMAGE_SLOTS.map(
    (slot) => `    "${slot}": {
      "url": "URL da imagem (${IMAGE_SLOT_DESCRIPTIONS[slot]}) ou N/A",
      "description": "descrição",
      "source": "fonte (Google Maps, Instagram, etc.)",
      "verified": true/false
    }`,
  ).join(',\n');

  return `
Busque imagens relevantes da empresa ${searchTerms(formattedCnpj, companyName)} especificamente como LOJISTA/CONCESSIONÁRIA DE VEÍCULOS.

IMAGENS PRIORITÁRIAS:
1. Fachada: entrada, letreiros, identificação visual
2. Logotipo e identidade visual
3. Interior: showroom, área de vendas
4. Equipe comercial
5. Veículos em exposição
6. Localização: Street View, vista aérea
7. Certificações e selos
8. Redes sociais (Instagram, Facebook)

FONTES: Google Images/Maps, Google Meu Negócio, site oficial, Instagram, Facebook, LinkedIn, Mercado Livre/OLX, Webmotors/iCarros.

ATENÇÃO:
- Apenas imagens REAIS e VERIFICÁVEIS
- Aponte inconsistências visuais
- Diga se as imagens indicam um negócio legítimo
- Confira se as imagens batem com o endereço oficial

RETORNE JSON com esta estrutura exata:
{
  "cnpj": "${formattedCnpj}",
  "company_name": "${companyName ?? 'N/A'}",
  "business_images": {
${slots}
  },
  "image_analysis": {
    "total_images_found": 0,
    "verified_images": 0,
    "legitimacy_indicators": [],
    "red_flags": [],
    "visual_consistency": "ALTA/MÉDIA/BAIXA",
    "business_appearance": "PROFISSIONAL/BÁSICO/DUVIDOSO/N/A"
  },
  "social_media_presence": {
    "instagram": {
      "url": "URL do perfil ou N/A",
      "followers": "número ou N/A",
      "posts": "número ou N/A",
      "recent_activity": "ATIVO/INATIVO/N/A"
    },
    "facebook": {
      "url": "URL da página ou N/A",
      "likes": "número ou N/A",
      "reviews": "número ou N/A",
      "recent_activity": "ATIVO/INATIVO/N/A"
    }
  }
}
`;
}
