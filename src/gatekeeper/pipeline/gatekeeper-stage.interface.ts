import type { Response } from 'express';
import type {
  GatekeeperContext,
  GatekeptRequest,
} from '../interfaces/gatekept-request.interface';
import type { StageOutcome } from './rejection';

export interface StageContext {
  req: GatekeptRequest;
  res: Response;
  /** Filled in by earlier stages; later stages may rely on it */
  state: GatekeeperContext;
  signal: AbortSignal;
}

/**
 * One link of a route's chain. Implementations report refusals through
 * their outcome and do not throw.
 */
export interface GatekeeperStage {
  readonly name: string;
  run(context: StageContext): StageOutcome | Promise<StageOutcome>;
}
