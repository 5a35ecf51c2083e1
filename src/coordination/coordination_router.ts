import type { ComponentResult, CoordinationOutcome, NodeRole } from "../contracts/component";
import { createDefaultLogger, type RelayLogger } from "../lib/log";
import type { SolutionStore } from "../store/solution_store";
import { shortFingerprint } from "./task_fingerprint";

export type CoordinationSettings = {
  ttlSeconds: number;
  waitTimeoutSeconds: number;
  pollIntervalSeconds: number;
};

export const DEFAULT_COORDINATION: CoordinationSettings = {
  ttlSeconds: 120,
  waitTimeoutSeconds: 55,
  pollIntervalSeconds: 0.5,
};

export type CoordinateArgs = {
  role: NodeRole;
  fingerprint: string;
  store: SolutionStore;
  // Produces an already extracted and resolved result. Failures propagate.
  generate: () => Promise<ComponentResult>;
  settings?: Partial<CoordinationSettings>;
  log?: RelayLogger;
};

export type Coordinated = {
  result: ComponentResult;
  outcome: CoordinationOutcome;
};

/**
 * One coordination flow for one request.
 *
 * waiter: START -> WAITING -> FOUND, or WAITING -> TIMED_OUT -> FALLBACK_SOLO.
 * An unreachable store skips WAITING, or ends it at the first failed read. After a fallback the store is not
 * consulted again for this request.
 */
export async function coordinate(args: CoordinateArgs): Promise<Coordinated> {
  const settings = { ...DEFAULT_COORDINATION, ...args.settings };
  const log = args.log ?? createDefaultLogger();
  const fp = shortFingerprint(args.fingerprint);

  switch (args.role) {
    case "solo": {
      const result = await args.generate();
      log.info({ fingerprint: fp }, "coordination.solo.generated");
      return { result, outcome: "generated" };
    }

    case "producer": {
      const result = await args.generate();
      const published = await args.store.put(args.fingerprint, result, settings.ttlSeconds);
      if (!published) {
        log.warn({ fingerprint: fp }, "coordination.producer.publish_failed");
        return { result, outcome: "publish_failed" };
      }
      log.info({ fingerprint: fp, ttlSeconds: settings.ttlSeconds }, "coordination.producer.published");
      return { result, outcome: "published" };
    }

    case "waiter": {
      if (!(await args.store.isAvailable())) {
        log.warn({ fingerprint: fp }, "coordination.waiter.store_unavailable");
        const result = await args.generate();
        return { result, outcome: "fallback_store_unavailable" };
      }

      const waited = await args.store.waitForSolution(
        args.fingerprint,
        settings.waitTimeoutSeconds,
        settings.pollIntervalSeconds
      );
      if (waited.status === "found") {
        log.info({ fingerprint: fp }, "coordination.waiter.found");
        return { result: waited.payload, outcome: "reused" };
      }
      if (waited.status === "store_unavailable") {
        log.warn({ fingerprint: fp }, "coordination.waiter.store_unavailable");
        const result = await args.generate();
        return { result, outcome: "fallback_store_unavailable" };
      }

      log.warn(
        { fingerprint: fp, waitTimeoutSeconds: settings.waitTimeoutSeconds },
        "coordination.waiter.fallback_solo"
      );
      const result = await args.generate();
      return { result, outcome: "fallback_timeout" };
    }
  }
}
