/**
 * Workflow Registry
 *
 * In-memory table of live and finished workflows, owned by a coordinator.
 * When more than `maxRetained` workflows are held, the oldest finished ones
 * are evicted; running and paused workflows are always kept.
 *
 * @module workflow/workflow-registry
 */

import type { WorkflowState } from '../types/index.js';
import { isTerminalStatus } from './state-machine.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workflow-registry');

export interface WorkflowRegistryOptions {
  maxRetained?: number;
}

export class WorkflowRegistry {
  private readonly workflows: Map<string, WorkflowState> = new Map();
  private readonly maxRetained: number;

  constructor(options: WorkflowRegistryOptions = {}) {
    this.maxRetained = options.maxRetained ?? 100;
  }

  /**
   * Register a workflow. Evicts finished workflows beyond the retention limit.
   */
  add(state: WorkflowState): void {
    this.workflows.set(state.id, state);
    this.evict();
  }

  get(workflowId: string): WorkflowState | undefined {
    return this.workflows.get(workflowId);
  }

  has(workflowId: string): boolean {
    return this.workflows.has(workflowId);
  }

  /**
   * Workflows in registration order
   */
  values(): WorkflowState[] {
    return Array.from(this.workflows.values());
  }

  get size(): number {
    return this.workflows.size;
  }

  /**
   * Evict the oldest finished workflows until the retention limit holds or
   * nothing evictable is left.
   */
  evict(): number {
    let excess = this.workflows.size - this.maxRetained;
    if (excess <= 0) {
      return 0;
    }

    const finished = this.values()
      .filter((state) => isTerminalStatus(state.status))
      .sort((a, b) => a.startTime.getTime() - b.startTime.getTime());

    let evicted = 0;
    for (const state of finished) {
      if (excess <= 0) {
        break;
      }
      this.workflows.delete(state.id);
      excess--;
      evicted++;
    }

    if (evicted > 0) {
      log.debug({ evicted, retained: this.workflows.size }, 'Evicted finished workflows');
    }
    return evicted;
  }
}
