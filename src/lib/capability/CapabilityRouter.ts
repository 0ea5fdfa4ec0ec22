import { CapabilityNotSupportedError } from '../errors.ts';
import { logger } from '../logger.ts';
import type { Orchestrator, RunningSession } from '../orchestrator/index.ts';

export interface DispatchOptions {
  /** How long to wait for a cold start before answering session_not_ready. */
  waitMs?: number;
}

/**
 * Entry point for capability calls (filesystem, shell, python, ...). Makes sure compute is up,
 * then checks the runtime actually offers the capability before handing back the session.
 */
export class CapabilityRouter {
  constructor(
    private orchestrator: Orchestrator,
    private defaultWaitMs: number,
  ) {}

  async dispatch(
    owner: string,
    sandboxId: string,
    capability: string,
    options: DispatchOptions = {},
  ): Promise<RunningSession> {
    this.orchestrator.get(owner, sandboxId);
    const session = await this.orchestrator.ensureRunning(sandboxId, {
      waitMs: options.waitMs ?? this.defaultWaitMs,
    });

    const available = await session.adapter.capabilities();
    if (!available.includes(capability)) {
      logger.warn(`[CapabilityRouter] ${capability} not offered by ${session.runtimeType}`, {
        sandbox: sandboxId,
      });
      throw new CapabilityNotSupportedError(capability, available);
    }
    logger.debug(`[CapabilityRouter] ${capability} -> ${session.endpoint}`, { sandbox: sandboxId });
    return session;
  }
}
