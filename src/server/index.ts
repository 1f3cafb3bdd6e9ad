import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from '../core/config.js';
import { createDealerServices, DealerServices } from '../domain/dealer/context.js';
import { PROMPTS, renderPrompt } from '../domain/dealer/catalog.js';
import { RESOURCES, readResource } from '../domain/dealer/resources.js';
import * as tools from '../domain/dealer/tools.js';
import { logInfo, logWarn } from '../core/logging.js';

// Server configuration
export const SERVER_NAME = 'dealer-fraud-check-mcp';
export const SERVER_VERSION = '1.0.0';

const CNPJ_PROPERTY = {
  type: 'string',
  description: 'CNPJ do lojista. Aceita "11.222.333/0001-81" ou "11222333000181"',
};

const COMPANY_NAME_PROPERTY = {
  type: 'string',
  description: 'Optional: company name, improves search precision',
};

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'validate_cnpj',
    description:
      'Validate the format and check digits of a Brazilian CNPJ. Returns the formatted CNPJ when valid. Does not query the language model.',
    inputSchema: {
      type: 'object',
      properties: { cnpj: CNPJ_PROPERTY },
      required: ['cnpj'],
    },
  },
  {
    name: 'verify_cnpj_status',
    description:
      'Check the official registration status of a CNPJ (Receita Federal): legal name, status, opening date, main activity, partners, and whether the activity fits vehicle retail.',
    inputSchema: {
      type: 'object',
      properties: { cnpj: CNPJ_PROPERTY },
      required: ['cnpj'],
    },
  },
  {
    name: 'check_dealer_reputation',
    description:
      'Check the online reputation of a vehicle dealer (Reclame Aqui, Google Reviews): complaint count, main issues, red flags, and a 0-100 reputation score.',
    inputSchema: {
      type: 'object',
      properties: { cnpj: CNPJ_PROPERTY, company_name: COMPANY_NAME_PROPERTY },
      required: ['cnpj'],
    },
  },
  {
    name: 'check_legal_issues',
    description:
      'Search lawsuits, investigations, sanctions and fraud indicators for a vehicle dealer. Returns a legal risk level (BAIXO/MÉDIO/ALTO/CRÍTICO).',
    inputSchema: {
      type: 'object',
      properties: { cnpj: CNPJ_PROPERTY, company_name: COMPANY_NAME_PROPERTY },
      required: ['cnpj'],
    },
  },
  {
    name: 'search_business_images',
    description:
      'Search images of the business (storefront, logo, showroom, staff, vehicles, location) and its social media presence.',
    inputSchema: {
      type: 'object',
      properties: { cnpj: CNPJ_PROPERTY, company_name: COMPANY_NAME_PROPERTY },
      required: ['cnpj'],
    },
  },
  {
    name: 'comprehensive_dealer_check',
    description:
      'Run all four checks concurrently and consolidate them into a risk score (0-100), risk level (BAIXO/MÉDIO/ALTO/CRÍTICO), risk factors, recommendation and next steps. A failing check is reported in place without aborting the others.',
    inputSchema: {
      type: 'object',
      properties: { cnpj: CNPJ_PROPERTY, company_name: COMPANY_NAME_PROPERTY },
      required: ['cnpj'],
    },
  },
  {
    name: 'get_cost_summary',
    description:
      'Summarize language-model spend of this server process: total cost, tokens, breakdown by model and by operation, and the last 10 requests.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'reset_cost_tracking',
    description:
      'Clear the language-model spend recorded by this server process. Returns the summary that was cleared.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];

// Format any ToolResponse into an MCP content response
function formatToolResponse(result: { success: boolean }) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

function argString(args: Record<string, unknown> | undefined, key: string): string {
  const val = args?.[key];
  return typeof val === 'string' ? val : '';
}

function argStringOpt(args: Record<string, unknown> | undefined, key: string): string | undefined {
  const val = args?.[key];
  return typeof val === 'string' ? val : undefined;
}

/**
 * Build the MCP server around explicitly constructed services.
 */
export function createServer(services: DealerServices): Server {
  const { tools: ctx, costs } = services;

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  // Handle list_tools request
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  // Handle call_tool request
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const cnpjInput = {
        cnpj: argString(args, 'cnpj'),
        company_name: argStringOpt(args, 'company_name'),
      };

      switch (name) {
        case 'validate_cnpj':
          return formatToolResponse(tools.validateCnpj({ cnpj: cnpjInput.cnpj }));
        case 'verify_cnpj_status':
          return formatToolResponse(await tools.verifyCnpjStatus(ctx, { cnpj: cnpjInput.cnpj }));
        case 'check_dealer_reputation':
          return formatToolResponse(await tools.checkDealerReputation(ctx, cnpjInput));
        case 'check_legal_issues':
          return formatToolResponse(await tools.checkLegalIssues(ctx, cnpjInput));
        case 'search_business_images':
          return formatToolResponse(await tools.searchBusinessImages(ctx, cnpjInput));
        case 'comprehensive_dealer_check':
          return formatToolResponse(await tools.comprehensiveDealerCheck(ctx, cnpjInput));
        case 'get_cost_summary':
          return formatToolResponse(tools.getCostSummary(costs));
        case 'reset_cost_tracking':
          return formatToolResponse(tools.resetCostTracking(costs));
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
        isError: true,
      };
    }
  });

  // Handle list_resources / read_resource
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: RESOURCES.map(({ uri, name, description, mimeType }) => ({
        uri,
        name,
        description,
        mimeType,
      })),
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { entry, text } = await readResource(request.params.uri);
    return {
      contents: [{ uri: entry.uri, mimeType: entry.mimeType, text }],
    };
  });

  // Handle list_prompts / get_prompt
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return { prompts: PROMPTS.map((p) => ({ ...p, arguments: [...p.arguments] })) };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { description, text } = renderPrompt(
      request.params.name,
      request.params.arguments ?? {},
    );
    return {
      description,
      messages: [
        {
          role: 'user' as const,
          content: { type: 'text' as const, text },
        },
      ],
    };
  });

  return server;
}

// Start server
export async function startServer(): Promise<void> {
  const config = loadConfig();
  if (!config.openai.apiKey) {
    logWarn('OPENAI_API_KEY is not set; query checks will report an error');
  }
  const services = createDealerServices(config);
  const server = createServer(services);

  // Graceful shutdown
  process.on('SIGINT', () => {
    logInfo('Received SIGINT, shutting down...');
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    logInfo('Received SIGTERM, shutting down...');
    process.exit(0);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}
