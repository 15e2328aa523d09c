/**
 * LinkService - drives the reconciler over a set of named declarations
 *
 * Keeps the state file in step with every link operation: the record of a
 * link is saved as soon as its operation succeeds, and a pass stops at the
 * first failure with the records written so far left in place.
 */

import type { LabApi } from '../client/LabApi';
import type { DeclaredLinks } from '../io/DeclarationIO';
import type { LinkStateStore, LinkStates } from '../io/LinkStateIO';
import type { IOLogger } from '../io/types';
import { noopLogger } from '../io/types';
import { deepEqual } from '../io/YamlDocumentIO';
import { LinkReconciler } from '../reconciler/LinkReconciler';
import { withStyleDefaults } from '../reconciler/StyleSynchronizer';
import type { LinkError } from '../reconciler/errors';
import type { LinkDeclaration, LinkState } from '../types/links';
import { shapeOfState } from '../types/links';

export type LinkAction = 'create' | 'update' | 'delete' | 'noop';

export interface PlannedChange {
  name: string;
  action: LinkAction;
}

export interface ApplyReport {
  created: string[];
  updated: string[];
  deleted: string[];
  unchanged: string[];
  /** Records dropped because their network vanished remotely */
  recreated: string[];
}

export interface DriftReport {
  name: string;
  error: LinkError;
}

export interface LinkServiceOptions {
  api: LabApi;
  store: LinkStateStore;
  logger?: IOLogger;
}

/**
 * Whether the persisted record already reflects the declaration.
 */
export function isInSync(decl: LinkDeclaration, state: LinkState): boolean {
  if (decl.labPath !== state.labPath) return false;
  if (!deepEqual(decl.source, state.source)) return false;
  if (!deepEqual(decl.target, state.target)) return false;
  if (decl.networkId !== undefined && decl.networkId !== state.networkId) return false;
  if (state.networkId === null) return false;
  // style is only tracked on node-to-node links
  if (decl.style !== undefined && decl.target !== undefined) {
    if (state.style === undefined) return false;
    const observed = state.style;
    // an empty snapshot means the lab reported nothing to compare against
    if (Object.keys(observed).length > 0 && !deepEqual(withStyleDefaults(decl.style), observed)) return false;
  }
  return true;
}

export class LinkService {
  private readonly reconciler: LinkReconciler;
  private readonly store: LinkStateStore;
  private readonly logger: IOLogger;

  constructor(options: LinkServiceOptions) {
    this.logger = options.logger ?? noopLogger;
    this.store = options.store;
    this.reconciler = new LinkReconciler({ api: options.api, logger: this.logger });
  }

  /**
   * Changes an apply would make, judged from the state file alone.
   */
  async plan(declared: DeclaredLinks): Promise<PlannedChange[]> {
    const states = await this.store.load();
    const changes: PlannedChange[] = [];

    for (const name of Object.keys(states).sort()) {
      if (!(name in declared)) changes.push({ name, action: 'delete' });
    }
    for (const name of Object.keys(declared).sort()) {
      const state = states[name];
      if (!state) {
        changes.push({ name, action: 'create' });
      } else {
        changes.push({ name, action: isInSync(declared[name], state) ? 'noop' : 'update' });
      }
    }
    return changes;
  }

  async apply(declared: DeclaredLinks): Promise<ApplyReport> {
    const states = await this.store.load();
    const report: ApplyReport = { created: [], updated: [], deleted: [], unchanged: [], recreated: [] };

    for (const name of Object.keys(states).sort()) {
      if (name in declared) continue;
      await this.reconciler.delete(states[name]);
      delete states[name];
      await this.persist(states);
      report.deleted.push(name);
      this.logger.info(`[LinkService] Deleted link ${name}`);
    }

    for (const name of Object.keys(declared).sort()) {
      const decl = declared[name];
      let state: LinkState | undefined = states[name];

      if (state) {
        const observed = await this.reconciler.read(state);
        if (observed.kind === 'gone') {
          report.recreated.push(name);
          delete states[name];
          state = undefined;
          this.logger.warn(`[LinkService] Link ${name} disappeared from the lab, recreating it`);
        } else {
          state = observed.state;
          states[name] = state;
          if (observed.kind === 'drifted') {
            this.logger.warn(`[LinkService] Link ${name} drifted: ${observed.error.message}`);
            // owned endpoints changed from outside are reported, never rebound
            if (shapeOfState(state) === 'node-to-node') {
              await this.persist(states);
              throw observed.error;
            }
          }
        }
      }

      if (!state) {
        states[name] = await this.reconciler.create(decl);
        report.created.push(name);
      } else if (isInSync(decl, state)) {
        report.unchanged.push(name);
        await this.persist(states);
        continue;
      } else {
        states[name] = await this.reconciler.update(decl, state);
        report.updated.push(name);
      }
      await this.persist(states);
      this.logger.info(`[LinkService] Link ${name} on network ${states[name].networkId}`);
    }

    return report;
  }

  /**
   * Re-read every record. Vanished links are dropped from the state, drifted
   * ones are stored as observed and reported.
   */
  async refresh(): Promise<DriftReport[]> {
    const states = await this.store.load();
    const drift: DriftReport[] = [];

    for (const name of Object.keys(states).sort()) {
      const observed = await this.reconciler.read(states[name]);
      switch (observed.kind) {
        case 'gone':
          delete states[name];
          this.logger.warn(`[LinkService] Link ${name} no longer exists`);
          break;
        case 'drifted':
          states[name] = observed.state;
          drift.push({ name, error: observed.error });
          this.logger.warn(`[LinkService] Link ${name} drifted: ${observed.error.message}`);
          break;
        case 'present':
          states[name] = observed.state;
          break;
      }
    }

    await this.persist(states);
    return drift;
  }

  /**
   * Delete every recorded link. Links already gone from the lab are only
   * dropped from the state.
   */
  async destroy(): Promise<string[]> {
    const states = await this.store.load();
    const deleted: string[] = [];

    for (const name of Object.keys(states).sort()) {
      const observed = await this.reconciler.read(states[name]);
      if (observed.kind !== 'gone') {
        await this.reconciler.delete(states[name]);
        deleted.push(name);
      }
      delete states[name];
      await this.persist(states);
    }
    return deleted;
  }

  private async persist(states: LinkStates): Promise<void> {
    const result = await this.store.save(states);
    if (!result.success) {
      throw new Error(`Failed to save ${this.store.getFilePath()}: ${result.error ?? 'unknown error'}`);
    }
  }
}
