import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runCli, type CliDeps } from './cli.js';
import { startStandInServer, type StandInResponse, type StandInServer } from './test/stand-in-server.js';

interface Captured {
  deps: CliDeps;
  stdout: () => string;
  stderr: () => string;
}

function capture(env: NodeJS.ProcessEnv): Captured {
  let out = '';
  let err = '';
  return {
    deps: {
      env,
      stdout: { write: (chunk: string) => (out += chunk) },
      stderr: { write: (chunk: string) => (err += chunk) },
      logger: pino({ level: 'silent' }),
    },
    stdout: () => out,
    stderr: () => err,
  };
}

describe('runCli', () => {
  let server: StandInServer;
  let reply: StandInResponse;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    reply = { status: 200, json: [{ id: '123' }] };
    server = await startStandInServer(() => reply);
    env = {
      MONEYBIRD_API_TOKEN: 'test-token',
      MONEYBIRD_API_URL: `${server.baseUrl}/api/`,
    };
  });

  afterEach(async () => {
    await server.close();
  });

  it('prints the result of a GET', async () => {
    const io = capture(env);

    await expect(runCli(['get', 'administrations'], io.deps)).resolves.toBe(0);

    expect(io.stdout()).toBe('[\n  {\n    "id": "123"\n  }\n]\n');
    expect(server.requests[0].path).toBe('/api/v2/administrations.json');
    expect(server.requests[0].headers.authorization).toBe('Bearer test-token');
  });

  it('passes the administration option', async () => {
    const io = capture(env);

    await runCli(['get', 'contacts', '--administration', '123'], io.deps);
    await runCli(['delete', 'contacts/1', '-a', '123'], io.deps);

    expect(server.requests.map((request) => `${request.method} ${request.path}`)).toEqual([
      'GET /api/v2/123/contacts.json',
      'DELETE /api/v2/123/contacts/1.json',
    ]);
  });

  it('sends JSON data with post and patch', async () => {
    reply = { status: 201, json: { id: '9' } };
    const io = capture(env);

    await expect(runCli(['post', 'contacts', '{"contact":{"firstname":"Ada"}}', '-a', '123'], io.deps)).resolves.toBe(0);
    await expect(runCli(['patch', 'contacts/9', '{"contact":{"lastname":"Lovelace"}}', '-a', '123'], io.deps)).resolves.toBe(0);

    expect(server.requests.map((request) => request.method)).toEqual(['POST', 'PATCH']);
    expect(JSON.parse(server.requests[0].body)).toEqual({ contact: { firstname: 'Ada' } });
    expect(JSON.parse(server.requests[1].body)).toEqual({ contact: { lastname: 'Lovelace' } });
  });

  it('reports API errors with exit code 1', async () => {
    reply = { status: 404, json: { error: 'record not found' } };
    const io = capture(env);

    await expect(runCli(['get', 'contacts/1', '-a', '123'], io.deps)).resolves.toBe(1);
    expect(io.stderr()).toBe('Error: API error 404: record not found\n');
    expect(io.stdout()).toBe('');
  });

  it('reports configuration errors with exit code 1', async () => {
    const io = capture({ LOG_LEVEL: 'verbose' });

    await expect(runCli(['get', 'administrations'], io.deps)).resolves.toBe(1);
    expect(io.stderr()).toMatch(/^Error: Invalid MoneyBird configuration: LOG_LEVEL: /);
  });

  it.each<[string[], string]>([
    [[], 'Missing command'],
    [['fetch', 'contacts'], 'Unknown command "fetch"'],
    [['get'], '"get" takes 1 argument(s), got 0'],
    [['post', 'contacts', '{not json'], 'Request data is not valid JSON'],
    [['post', 'contacts', '[1,2]'], 'Request data must be a JSON object'],
  ])('exits with 2 on usage error %j', async (argv, message) => {
    const io = capture(env);

    await expect(runCli(argv, io.deps)).resolves.toBe(2);
    expect(io.stderr().startsWith(`Error: ${message}\n\nUsage:\n`)).toBe(true);
    expect(server.requests).toHaveLength(0);
  });

  it('rejects unknown options', async () => {
    const io = capture(env);
    await expect(runCli(['get', 'contacts', '--tenant', '1'], io.deps)).resolves.toBe(2);
  });

  describe('OAuth commands', () => {
    let oauthEnv: NodeJS.ProcessEnv;

    beforeEach(() => {
      oauthEnv = {
        ...env,
        MONEYBIRD_API_TOKEN: undefined,
        MONEYBIRD_CLIENT_ID: 'test_client',
        MONEYBIRD_CLIENT_SECRET: 'test_secret',
        MONEYBIRD_REDIRECT_URI: 'https://example.test/login/oauth/',
        MONEYBIRD_OAUTH_URL: `${server.baseUrl}/oauth/`,
      };
    });

    it('prints the authorization URL and state', async () => {
      const io = capture(oauthEnv);

      await expect(runCli(['authorize', 'sales_invoices', 'documents'], io.deps)).resolves.toBe(0);

      const printed: { url: string; state: string } = JSON.parse(io.stdout());
      const url = new URL(printed.url);
      expect(`${url.origin}${url.pathname}`).toBe(`${server.baseUrl}/oauth/authorize/`);
      expect(url.searchParams.get('scope')).toBe('sales_invoices documents');
      expect(url.searchParams.get('state')).toBe(printed.state);
    });

    it('exchanges a redirect for a token', async () => {
      reply = { status: 200, json: { access_token: 'token_for_auth' } };
      const io = capture(oauthEnv);

      await expect(
        runCli(['exchange', 'https://example.test/login/oauth/?code=any&state=abc', 'abc'], io.deps),
      ).resolves.toBe(0);

      expect(JSON.parse(io.stdout())).toEqual({ access_token: 'token_for_auth' });
      expect(server.requests[0].path).toBe('/oauth/token/');
    });

    it('requires an OAuth identity', async () => {
      const io = capture(env);

      await expect(runCli(['authorize'], io.deps)).resolves.toBe(2);
      expect(io.stderr()).toContain('OAuth is not configured');
    });
  });
});
