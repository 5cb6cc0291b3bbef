/**
 * Tests for watchdog initialization
 */

import type { Mock } from 'vitest';
import type { FetchFn, WatchdogEnvConfig } from '$types';
import type { ConsoleAPI, Logger } from '@logging';
import { initialize, loadInventory } from './init';

const SDWAN_URL = 'https://vmanage.test:8443';

const ENV: WatchdogEnvConfig = {
  SDWAN_URL,
  SDWAN_USER: 'admin',
  SDWAN_PASS: 'test-secret',
  UPS_USER: 'ups-admin',
  UPS_PASS: 'test-secret',
  LOG_LEVEL: 1,
  HTTP_TIMEOUT_MS: 5000,
  TLS_VERIFY: false,
  SLACK_WEBHOOK_URL: null,
  SLACK_LOG_LEVEL: 2,
  CONFIG_PATH: './config.yaml'
};

const CONFIG_YAML = [
  'trigger:',
  '  interval: 30',
  '  count: 3',
  'sites:',
  '  100:',
  '    color: biz-internet',
  '    ups: 10.0.0.5',
  '    outlet: 2',
  '  200:',
  '    color: mpls',
  '    ups: 10.0.0.6',
  '    outlet: 1',
  ''
].join('\n');

const INVENTORY = {
  data: [
    { 'site-id': '1', personality: 'vmanage', reachability: 'reachable', 'system-ip': '1.1.1.1' },
    { 'site-id': '100', personality: 'vedge', reachability: 'reachable', 'system-ip': '10.1.1.1' },
    { 'site-id': '100', personality: 'vedge', reachability: 'unreachable', 'system-ip': '10.1.1.2' },
    { 'site-id': '200', personality: 'vedge', reachability: 'reachable', 'system-ip': '10.2.2.1' },
    { 'site-id': '300', personality: 'vedge', reachability: 'reachable', 'system-ip': '10.3.3.1' }
  ]
};

type Route = () => Response;

function routedFetch(routes: Record<string, Route>): Mock<FetchFn> {
  return vi.fn<FetchFn>(async (input) => {
    const route = routes[input];
    if (!route) {
      throw new Error(`unexpected request ${input}`);
    }
    return route();
  });
}

function sdwanRoutes(overrides: Record<string, Route> = {}): Record<string, Route> {
  return {
    [`${SDWAN_URL}/j_security_check`]: () =>
      new Response('', { status: 200, headers: { 'Set-Cookie': 'JSESSIONID=session-1; Path=/' } }),
    [`${SDWAN_URL}/dataservice/client/token`]: () => new Response('xsrf-1', { status: 200 }),
    [`${SDWAN_URL}/dataservice/device`]: () => new Response(JSON.stringify(INVENTORY), { status: 200 }),
    ...overrides
  };
}

describe('initialize', () => {
  let mockConsole: ConsoleAPI;
  let readText: Mock<(path: string) => Promise<string>>;
  let processEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    mockConsole = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    readText = vi.fn<(path: string) => Promise<string>>(async () => CONFIG_YAML);
    processEnv = {};
  });

  describe('successful initialization', () => {
    it('should return a monitor with one neutral window per configured site', async () => {
      const monitor = await initialize({
        env: ENV, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv
      });

      expect(monitor).not.toBeNull();
      expect(monitor?.state.sites.map((s) => s.id)).toEqual([100, 200]);
      expect(monitor?.state.sites[0].liveness.samples).toEqual([null, null, null]);
      expect(monitor?.state.trigger).toEqual({ interval: 30, count: 3 });
    });

    it('should keep only reachable edge devices of configured sites', async () => {
      const monitor = await initialize({
        env: ENV, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv
      });

      expect(monitor?.state.sites.map((s) => s.devices)).toEqual([['10.1.1.1'], ['10.2.2.1']]);
    });

    it('should read the configuration from env.CONFIG_PATH unless overridden', async () => {
      await initialize({ env: ENV, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv });
      await initialize({
        env: ENV, configPath: '/etc/watchdog.yaml', fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv
      });

      expect(readText.mock.calls).toEqual([['./config.yaml'], ['/etc/watchdog.yaml']]);
    });

    it('should wire the power-cycle timings and injected sleep', async () => {
      const sleep = vi.fn(async () => undefined);
      const monitor = await initialize({
        env: ENV, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv, sleep
      });

      expect(monitor?.powerCycle).toMatchObject({ settleMs: 5000, confirmMs: 2000, maxAttempts: 3, sleep });
      expect(monitor?.sleep).toBe(sleep);
    });

    it('should disable TLS verification when TLS_VERIFY is false', async () => {
      await initialize({ env: ENV, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv });

      expect(processEnv.NODE_TLS_REJECT_UNAUTHORIZED).toBe('0');
    });

    it('should leave TLS verification alone when TLS_VERIFY is true', async () => {
      await initialize({
        env: { ...ENV, TLS_VERIFY: true }, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv
      });

      expect(processEnv.NODE_TLS_REJECT_UNAUTHORIZED).toBeUndefined();
    });

    it('should apply the log level override', async () => {
      const monitor = await initialize({
        env: ENV, logLevel: 3, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv
      });

      expect(monitor?.logger.getLevel()).toBe(3);
      expect(mockConsole.log).not.toHaveBeenCalled();
    });

    it('should start with empty device lists when the inventory fails', async () => {
      const fetchImpl = routedFetch(sdwanRoutes({
        [`${SDWAN_URL}/dataservice/device`]: () => new Response('busy', { status: 503, statusText: 'Service Unavailable' })
      }));

      const monitor = await initialize({ env: ENV, fetchImpl, consoleApi: mockConsole, readText, processEnv });

      expect(monitor?.state.sites.map((s) => s.devices)).toEqual([[], []]);
      expect(mockConsole.error).toHaveBeenCalledWith(
        expect.stringContaining('Failed to retrieve device inventory: HTTP 503: Service Unavailable')
      );
    });

    it('should print sink init failures after the title', async () => {
      const monitor = await initialize({
        env: { ...ENV, SLACK_WEBHOOK_URL: 'ftp://hooks.test/x' },
        fetchImpl: routedFetch(sdwanRoutes()),
        consoleApi: mockConsole,
        readText,
        processEnv
      });

      expect(monitor).not.toBeNull();
      expect(mockConsole.log).toHaveBeenCalledWith('⚠️ [WARNING]  Slack webhook URL has unsupported protocol ftp:');
    });
  });

  describe('configuration failures', () => {
    it('should return null when the file cannot be read', async () => {
      readText.mockRejectedValueOnce(new Error('ENOENT: no such file or directory'));
      const fetchImpl = routedFetch(sdwanRoutes());

      const monitor = await initialize({ env: ENV, fetchImpl, consoleApi: mockConsole, readText, processEnv });

      expect(monitor).toBeNull();
      expect(mockConsole.error).toHaveBeenCalledWith(
        'INIT FAIL: Cannot read configuration file ./config.yaml: ENOENT: no such file or directory'
      );
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should list every validation error', async () => {
      readText.mockResolvedValueOnce('trigger:\n  interval: 0\n  count: 3\nsites:\n  100:\n    color: biz-internet\n    ups: 10.0.0.5\n');

      const monitor = await initialize({
        env: ENV, fetchImpl: routedFetch(sdwanRoutes()), consoleApi: mockConsole, readText, processEnv
      });

      expect(monitor).toBeNull();
      expect(mockConsole.error).toHaveBeenNthCalledWith(1, 'INIT FAIL: Invalid configuration (./config.yaml)');
      expect(mockConsole.error).toHaveBeenCalledTimes(3);
    });
  });

  describe('SD-WAN login failure', () => {
    it('should return null and log critical when the manager rejects the login', async () => {
      const fetchImpl = routedFetch(sdwanRoutes({
        [`${SDWAN_URL}/j_security_check`]: () => new Response('', { status: 401, statusText: 'Unauthorized' })
      }));

      const monitor = await initialize({ env: ENV, fetchImpl, consoleApi: mockConsole, readText, processEnv });

      expect(monitor).toBeNull();
      expect(mockConsole.error).toHaveBeenCalledWith(
        expect.stringContaining(`Failed to authenticate to ${SDWAN_URL}: HTTP 401: Unauthorized`)
      );
    });
  });
});

describe('loadInventory', () => {
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = {
      log: vi.fn(), debug: vi.fn(), info: vi.fn(), warning: vi.fn(), critical: vi.fn(),
      setLevel: vi.fn(), getLevel: vi.fn(() => 1 as const), initialize: vi.fn(async () => [])
    };
  });

  it('should return the listed devices', async () => {
    const devices = [{ siteId: 100, personality: 'vedge', reachability: 'reachable', systemIp: '10.1.1.1' }];

    await expect(loadInventory(async () => devices, mockLogger)).resolves.toBe(devices);
  });

  it('should log critical and return an empty list on failure', async () => {
    const result = await loadInventory(async () => {
      throw new Error('Response has no data array');
    }, mockLogger);

    expect(result).toEqual([]);
    expect(mockLogger.critical).toHaveBeenCalledWith('Failed to retrieve device inventory: Response has no data array');
  });
});
