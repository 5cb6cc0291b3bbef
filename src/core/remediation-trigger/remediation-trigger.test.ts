import type { Mock } from 'vitest';
import type { OutletReading, OutletSession } from '$types';
import type { Logger } from '@logging';
import { createLivenessWindow, updateLiveness } from '../liveness-tracker/liveness-tracker';
import { checkRemediation } from './remediation-trigger';
import { createRemediationLedger, targetKey } from './helpers';
import type { RemediationContext, RemediationSite } from './types';

function site(id: number, ups = '10.0.0.5', outlet = 2, count = 3): RemediationSite {
  return { id, target: { ups, outlet }, liveness: createLivenessWindow(count) };
}

function fillDown(target: RemediationSite): void {
  for (let i = 0; i < target.liveness.size; i++) {
    updateLiveness(target.liveness, 'DOWN');
  }
}

/** Session whose outlet is on, goes off when asked, and comes back on when asked */
function workingSession(): OutletSession {
  let on: OutletReading = true;
  return {
    getOutletState: vi.fn(async () => on),
    setOutletState: vi.fn(async (_outlet: number, next: boolean) => {
      on = next;
      return true;
    })
  };
}

describe('checkRemediation', () => {
  let mockLogger: Logger;
  let openSession: Mock<(address: string) => Promise<OutletSession | null>>;
  let context: RemediationContext;

  beforeEach(() => {
    mockLogger = {
      log: vi.fn(), debug: vi.fn(), info: vi.fn(), warning: vi.fn(), critical: vi.fn(),
      setLevel: vi.fn(), getLevel: vi.fn(() => 1 as const), initialize: vi.fn(async () => [])
    };
    openSession = vi.fn<(address: string) => Promise<OutletSession | null>>(async () => workingSession());
    context = {
      openSession,
      powerCycle: {
        settleMs: 5000,
        confirmMs: 2000,
        maxAttempts: 3,
        sleep: async () => undefined,
        logger: mockLogger
      },
      ledger: createRemediationLedger(),
      logger: mockLogger
    };
  });

  it('should do nothing while the window is not confirmed down', async () => {
    const target = site(100);
    updateLiveness(target.liveness, 'DOWN');
    updateLiveness(target.liveness, 'DOWN');

    await expect(checkRemediation(target, context)).resolves.toEqual({ action: 'idle' });
    expect(openSession).not.toHaveBeenCalled();
    expect(target.liveness.samples).toEqual(['DOWN', 'DOWN', null]);
  });

  it('should power cycle once and reset the window', async () => {
    const target = site(100);
    fillDown(target);

    const outcome = await checkRemediation(target, context);

    expect(outcome.action).toBe('remediated');
    if (outcome.action === 'remediated') {
      expect(outcome.result.outcome).toBe('SUCCESS');
    }
    expect(openSession).toHaveBeenCalledWith('10.0.0.5');
    expect(target.liveness.samples).toEqual([null, null, null]);
    expect(context.ledger.get('10.0.0.5#2')).toBe(100);
    expect(mockLogger.info).toHaveBeenCalledWith('Beginning power cycle operation for outlet 2 on UPS 10.0.0.5');
  });

  it('should not fire again for a later device in the same pass', async () => {
    const target = site(100);
    fillDown(target);
    await checkRemediation(target, context);

    updateLiveness(target.liveness, 'DOWN');
    const second = await checkRemediation(target, context);

    expect(second).toEqual({ action: 'idle' });
    expect(openSession).toHaveBeenCalledTimes(1);
  });

  it('should report no_session and still reset when the UPS login fails', async () => {
    openSession.mockResolvedValueOnce(null);
    const target = site(100);
    fillDown(target);

    const outcome = await checkRemediation(target, context);

    expect(outcome).toEqual({
      action: 'remediated',
      result: { outcome: 'FAILED', attempts: 0, reason: 'no_session', trace: ['FAILED'] }
    });
    expect(target.liveness.samples).toEqual([null, null, null]);
    expect(mockLogger.critical).toHaveBeenCalledWith('Power cycle of outlet 2 on UPS 10.0.0.5 for site 100 failed: no_session');
  });

  it('should reset the window even when opening the session throws', async () => {
    openSession.mockRejectedValueOnce(new Error('boom'));
    const target = site(100);
    fillDown(target);

    await expect(checkRemediation(target, context)).rejects.toThrow('boom');
    expect(target.liveness.samples).toEqual([null, null, null]);
  });

  describe('shared outlet', () => {
    it('should skip a second site that confirms down against an outlet already cycled this pass', async () => {
      const first = site(100);
      const second = site(200, '10.0.0.5', 2);
      fillDown(first);
      fillDown(second);

      await checkRemediation(first, context);
      const outcome = await checkRemediation(second, context);

      expect(outcome).toEqual({ action: 'skipped', claimedBy: 100 });
      expect(openSession).toHaveBeenCalledTimes(1);
      expect(second.liveness.samples).toEqual([null, null, null]);
    });

    it('should cycle a different outlet on the same UPS', async () => {
      const first = site(100, '10.0.0.5', 2);
      const second = site(200, '10.0.0.5', 3);
      fillDown(first);
      fillDown(second);

      await checkRemediation(first, context);
      const outcome = await checkRemediation(second, context);

      expect(outcome.action).toBe('remediated');
      expect(openSession).toHaveBeenCalledTimes(2);
    });

    it('should cycle the outlet again once the ledger is cleared for a new pass', async () => {
      const target = site(100);
      fillDown(target);
      await checkRemediation(target, context);

      context.ledger.clear();
      fillDown(target);
      const outcome = await checkRemediation(target, context);

      expect(outcome.action).toBe('remediated');
      expect(openSession).toHaveBeenCalledTimes(2);
    });
  });

  describe('targetKey', () => {
    it('should ignore address case', () => {
      expect(targetKey({ ups: 'UPS-A.example.test', outlet: 1 })).toBe(targetKey({ ups: 'ups-a.example.test', outlet: 1 }));
    });
  });
});
