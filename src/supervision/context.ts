/**
 * Per-run supervision context.
 *
 * Everything a run mutates (process registry, disconnection flag, acquired
 * host resources, live monitors) hangs off one object created per run and
 * handed to each component.
 */
import type { BridgeConfig } from "../config/index.js";
import { DisconnectionSignal } from "../process/disconnection-signal.js";
import type { StreamMonitor } from "../process/stream-monitor.js";
import { ProcessSupervisor } from "../process/supervisor.js";
import type { Logger } from "../shared/logger.js";
import type { ExternalResources } from "../shared/types.js";

export interface SupervisionContext {
  readonly config: BridgeConfig;
  readonly logger: Logger;
  readonly supervisor: ProcessSupervisor;
  readonly signal: DisconnectionSignal;
  /** Filled in by setup as each resource is acquired. */
  readonly resources: ExternalResources;
  /** Monitors that may still be reading. */
  readonly monitors: Set<StreamMonitor>;
}

export function createSupervisionContext(
  config: BridgeConfig,
  logger: Logger,
  resources: ExternalResources = { audioModuleId: null, pipePath: null },
): SupervisionContext {
  return {
    config,
    logger,
    supervisor: new ProcessSupervisor(logger.child({ component: "supervisor" })),
    signal: new DisconnectionSignal(),
    resources,
    monitors: new Set(),
  };
}
