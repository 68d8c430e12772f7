import { HttpStatus, Logger } from '@nestjs/common';
import type { NextFunction, Response } from 'express';
import {
  ClientDisconnectedError,
  errorStack,
  RequestTimeoutError,
} from '../errors';
import type {
  GatekeeperContext,
  GatekeptRequest,
} from '../interfaces/gatekept-request.interface';
import type { GatekeeperStage, StageContext } from './gatekeeper-stage.interface';
import type { Rejection, StageOutcome } from './rejection';

export type PipelineResult =
  | { accepted: true; context: GatekeeperContext }
  | { accepted: false; rejection: Rejection }
  /** The client went away; there is nobody to answer */
  | { accepted: false; rejection: null };

/**
 * A route's fixed chain of stages. Built once at startup by the
 * PipelineComposer and mounted through `handler`.
 */
export class RoutePipeline {
  private readonly logger: Logger;

  constructor(
    readonly id: string,
    readonly stages: readonly GatekeeperStage[],
    readonly timeoutMs: number,
  ) {
    this.logger = new Logger(`${RoutePipeline.name}:${id}`);
  }

  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  async run(
    req: GatekeptRequest,
    res: Response,
    signal: AbortSignal,
  ): Promise<PipelineResult> {
    const state: GatekeeperContext = {
      requestId: req.requestId,
      clientKey: clientKeyOf(req),
    };
    const context: StageContext = { req, res, state, signal };

    for (const stage of this.stages) {
      let outcome: StageOutcome;
      try {
        outcome = await untilAborted(
          Promise.resolve().then(() => stage.run(context)),
          signal,
        );
      } catch (error) {
        return this.failed(stage, error);
      }
      if (!outcome.pass) {
        return { accepted: false, rejection: outcome.rejection };
      }
    }

    return { accepted: true, context: state };
  }

  /**
   * Express middleware. Writes the rejection envelope itself, or attaches
   * `req.gatekeeper` and hands over to the next handler.
   */
  readonly handler = (
    req: GatekeptRequest,
    res: Response,
    next: NextFunction,
  ): void => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new RequestTimeoutError(this.timeoutMs));
    }, this.timeoutMs);
    res.once('close', () => {
      if (!res.writableFinished) {
        controller.abort(new ClientDisconnectedError());
      }
    });

    void this.run(req, res, controller.signal)
      .then((result) => {
        clearTimeout(timer);
        if (result.accepted) {
          req.gatekeeper = result.context;
          next();
          return;
        }
        if (result.rejection === null || res.headersSent) {
          return;
        }
        const { status, error, message, headers } = result.rejection;
        if (headers) {
          res.set(headers);
        }
        res.status(status).json({ success: false, message, error });
      })
      .catch(next);
  };

  private failed(stage: GatekeeperStage, error: unknown): PipelineResult {
    if (error instanceof RequestTimeoutError) {
      this.logger.warn(`Timed out in stage "${stage.name}": ${error.message}`);
      return {
        accepted: false,
        rejection: {
          status: HttpStatus.REQUEST_TIMEOUT,
          error: 'RequestTimeout',
          message: 'Request timed out',
        },
      };
    }
    if (error instanceof ClientDisconnectedError) {
      this.logger.debug(`Client disconnected during stage "${stage.name}"`);
      return { accepted: false, rejection: null };
    }

    this.logger.error(
      `Stage "${stage.name}" threw unexpectedly`,
      errorStack(error),
    );
    return {
      accepted: false,
      rejection: {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'InternalFailure',
        message: 'Internal server error',
      },
    };
  }
}

/** `req.ip` already honours the app's trust-proxy setting */
export function clientKeyOf(req: GatekeptRequest): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject<T>(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
