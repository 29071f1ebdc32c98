/**
 * cli.ts — command-line front end for the MoneyBird client.
 *
 *   moneybird get <path> [--administration <id>]
 *   moneybird post <path> <json> [--administration <id>]
 *   moneybird patch <path> <json> [--administration <id>]
 *   moneybird delete <path> [--administration <id>]
 *   moneybird authorize [scope...]
 *   moneybird exchange <redirect-url> <state>
 *
 * Results are printed as JSON on stdout. Logs and errors go to stderr.
 * Exit codes: 0 success, 1 request or configuration failure, 2 usage error.
 */

import { parseArgs } from 'node:util';
import { destination, type Logger } from 'pino';
import { OAuthAuthentication } from './auth/oauth.js';
import { MoneybirdClient } from './client/MoneybirdClient.js';
import type { RequestData } from './client/types.js';
import { createAuthentication, loadConfig, type MoneybirdConfig } from './config.js';
import { createLogger } from './logger.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  stdout: OutputStream;
  stderr: OutputStream;
  logger?: Logger;
}

export const USAGE = [
  'Usage:',
  '  moneybird get <path> [--administration <id>]',
  '  moneybird post <path> <json> [--administration <id>]',
  '  moneybird patch <path> <json> [--administration <id>]',
  '  moneybird delete <path> [--administration <id>]',
  '  moneybird authorize [scope...]',
  '  moneybird exchange <redirect-url> <state>',
].join('\n');

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface ParsedCommand {
  command: string;
  args: string[];
  administrationId?: string;
}

function parseArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        administration: { type: 'string', short: 'a' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function parseCommand(argv: string[]): ParsedCommand {
  const parsed = parseArgv(argv);
  const [command, ...args] = parsed.positionals;
  if (!command) {
    throw new UsageError('Missing command');
  }
  return { command, args, administrationId: parsed.values.administration };
}

function requireArgs(parsed: ParsedCommand, count: number): string[] {
  if (parsed.args.length !== count) {
    throw new UsageError(`"${parsed.command}" takes ${count} argument(s), got ${parsed.args.length}`);
  }
  return parsed.args;
}

function parseData(json: string): RequestData {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    throw new UsageError('Request data is not valid JSON');
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new UsageError('Request data must be a JSON object');
  }
  return Object.fromEntries(Object.entries(data));
}

function requireOAuth(config: MoneybirdConfig, logger: Logger): OAuthAuthentication {
  const authentication = createAuthentication(config, logger);
  if (!(authentication instanceof OAuthAuthentication)) {
    throw new UsageError('OAuth is not configured: set MONEYBIRD_CLIENT_ID, MONEYBIRD_CLIENT_SECRET and MONEYBIRD_REDIRECT_URI');
  }
  return authentication;
}

async function execute(parsed: ParsedCommand, config: MoneybirdConfig, logger: Logger): Promise<unknown> {
  switch (parsed.command) {
    case 'get':
    case 'delete': {
      const [path] = requireArgs(parsed, 1);
      const client = new MoneybirdClient(createAuthentication(config, logger), { baseUrl: config.apiUrl, logger });
      return parsed.command === 'get'
        ? client.get(path, parsed.administrationId)
        : client.delete(path, parsed.administrationId);
    }
    case 'post':
    case 'patch': {
      const [path, json] = requireArgs(parsed, 2);
      const data = parseData(json);
      const client = new MoneybirdClient(createAuthentication(config, logger), { baseUrl: config.apiUrl, logger });
      return parsed.command === 'post'
        ? client.post(path, data, parsed.administrationId)
        : client.patch(path, data, parsed.administrationId);
    }
    case 'authorize': {
      return requireOAuth(config, logger).authorizeUrl(parsed.args);
    }
    case 'exchange': {
      const [redirectUrl, state] = requireArgs(parsed, 2);
      const token = await requireOAuth(config, logger).obtainToken(redirectUrl, state);
      return { access_token: token };
    }
    default:
      throw new UsageError(`Unknown command "${parsed.command}"`);
  }
}

/**
 * runCli — parses argv, runs one command and resolves to the exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  try {
    const parsed = parseCommand(argv);
    const config = loadConfig(deps.env);
    const logger = deps.logger ?? createLogger({ level: config.logLevel, destination: destination(2) });

    const result = await execute(parsed, config, logger);
    deps.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      deps.stderr.write(`Error: ${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    const message = error instanceof Error ? error.message : String(error);
    deps.stderr.write(`Error: ${message}\n`);
    return 1;
  }
}
