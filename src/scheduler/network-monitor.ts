/* src/scheduler/network-monitor.ts */

/**
 * Network-class input for the scheduler. Detection is platform specific, so
 * the engine only consumes a class and a change notification; an external
 * connectivity source feeds StaticNetworkMonitor.
 */

import { EventEmitter } from "node:events";
import type { NetworkClass, NetworkRequirement } from "../core/types";

export interface NetworkMonitor {
  current(): NetworkClass;
  /** Returns an unsubscribe function */
  onChange(listener: (network: NetworkClass) => void): () => void;
}

const ACCEPTED: Record<NetworkRequirement, readonly NetworkClass[]> = {
  any: ["local", "unmetered", "metered"],
  unmetered: ["local", "unmetered"],
  local: ["local"],
};

/**
 * Whether a task with `requirement` may transfer on `network`
 */
export function satisfiesRequirement(requirement: NetworkRequirement, network: NetworkClass): boolean {
  return ACCEPTED[requirement].includes(network);
}

export function isUsable(network: NetworkClass): boolean {
  return network !== "offline";
}

export class StaticNetworkMonitor extends EventEmitter implements NetworkMonitor {
  private network: NetworkClass;

  constructor(initial: NetworkClass = "unmetered") {
    super();
    this.network = initial;
  }

  current(): NetworkClass {
    return this.network;
  }

  set(network: NetworkClass): void {
    if (network === this.network) return;
    this.network = network;
    this.emit("change", network);
  }

  onChange(listener: (network: NetworkClass) => void): () => void {
    this.on("change", listener);
    return () => {
      this.off("change", listener);
    };
  }
}
