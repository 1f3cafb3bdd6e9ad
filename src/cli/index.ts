import { parseArgs } from 'node:util';
import { loadConfig } from '../core/config.js';
import { logError, logInfo } from '../core/logging.js';
import { createDealerServices, DealerServices } from '../domain/dealer/context.js';
import * as tools from '../domain/dealer/tools.js';
import { ToolResponse } from '../domain/dealer/types.js';

type QueryCommand = (ctx: tools.ToolContext, input: tools.CnpjCheckInput) => Promise<ToolResponse<unknown>>;

const QUERY_COMMANDS: Record<string, QueryCommand> = {
  status: tools.verifyCnpjStatus,
  reputation: tools.checkDealerReputation,
  legal: tools.checkLegalIssues,
  images: tools.searchBusinessImages,
  complete: tools.comprehensiveDealerCheck,
};

export const USAGE = `Usage: dealer-check <command> <cnpj> [--empresa|-e <name>]

Commands:
  validate     Validate CNPJ check digits (no query)
  status       Registration status at Receita Federal
  reputation   Online reputation and complaints
  legal        Lawsuits, investigations and sanctions
  images       Business images and social media presence
  complete     All checks plus consolidated risk analysis`;

export interface CliDeps {
  /** Builds the query services; only called for commands that query. */
  createServices?: () => DealerServices;
  /** Receives the JSON result. Defaults to stdout. */
  write?: (text: string) => void;
}

function defaultWrite(text: string): void {
  process.stdout.write(`${text}\n`);
}

/**
 * Run one CLI invocation and resolve to the process exit code.
 * The result is printed as JSON; usage and diagnostics go to stderr.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const write = deps.write ?? defaultWrite;

  let command: string | undefined;
  let cnpj: string | undefined;
  let companyName: string | undefined;
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        empresa: { type: 'string', short: 'e' },
      },
      allowPositionals: true,
    });
    [command, cnpj] = positionals;
    companyName = values.empresa;
    if (positionals.length > 2) {
      throw new Error(`Unexpected argument: ${positionals[2]}`);
    }
  } catch (error) {
    logError(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (!command || !cnpj) {
    console.error(USAGE);
    return 1;
  }

  if (command === 'validate') {
    const result = tools.validateCnpj({ cnpj });
    write(JSON.stringify(result, null, 2));
    return result.data?.is_valid ? 0 : 1;
  }

  const run = QUERY_COMMANDS[command];
  if (!run) {
    logError(`Unknown command: ${command}`);
    console.error(USAGE);
    return 1;
  }

  try {
    const createServices =
      deps.createServices ?? (() => createDealerServices(loadConfig(), { requireApiKey: true }));
    const services = createServices();
    const result = await run(services.tools, { cnpj, company_name: companyName });
    write(JSON.stringify(result, null, 2));

    const summary = services.costs.getSummary();
    logInfo(
      `Cost: $${summary.total_cost_usd.toFixed(4)} over ${summary.total_requests} request(s), ${summary.total_tokens} tokens`,
    );
    return result.success ? 0 : 1;
  } catch (error) {
    logError(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
