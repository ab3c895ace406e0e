/**
 * Completes active investments whose term has ended.
 */

import type { EngineContext } from "../context.js";
import { completeMaturedInvestments } from "../modules/investments/services/investments.service.js";

export interface MaturityWorkerOptions {
  intervalMs: number;
  batchLimit: number;
}

export function startMaturityWorker(ctx: EngineContext, options: MaturityWorkerOptions) {
  let timer: ReturnType<typeof setInterval> | null = null;
  let running = false;

  async function tick() {
    if (running) return;
    running = true;
    try {
      const result = await completeMaturedInvestments(ctx, options.batchLimit);
      if (result.completed > 0) {
        ctx.log.info(`[maturity] Completed ${result.completed} of ${result.scanned} matured investments`);
      }
    } catch (err) {
      ctx.log.error(err, "[maturity-worker] error");
    } finally {
      running = false;
    }
  }

  timer = setInterval(() => {
    void tick();
  }, options.intervalMs);

  return {
    stop: () => {
      if (timer) clearInterval(timer);
      timer = null;
    },
    triggerNow: tick,
  };
}
