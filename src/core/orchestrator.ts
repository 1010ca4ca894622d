import { logDebug } from "@cli/utils/logger";
import { AssetBuildError, AssetBuildFailure } from "@core/errors";
import type { AssetOutput } from "@core/pipelines";
import type { AssetId, AssetKind } from "@core/pipelines/shared";
import type { KilnFailurePolicy } from "../types/config";

/** Anything that builds one asset; every pipeline in `@core/pipelines` is one. */
export interface Spawnable {
  readonly id: AssetId;
  readonly kind: AssetKind;
  spawn(): Promise<AssetOutput>;
}

export interface CompletedAsset {
  id: AssetId;
  output: AssetOutput;
}

type Settled =
  | { ok: true; id: AssetId; output: AssetOutput }
  | { ok: false; id: AssetId; error: AssetBuildError };

export interface OrchestratorOptions {
  failurePolicy?: KilnFailurePolicy;
  /** Called once per successful asset, in completion order. */
  onComplete?: (completed: CompletedAsset) => void;
}

/**
 * Fans out asset pipelines and gathers their outputs.
 *
 * Every pipeline starts the moment it is spawned. Results come back in
 * whatever order the pipelines finish and are matched to their placeholder
 * by id only. A failure never stops a sibling that is already running, so
 * anything a successful sibling wrote stays on disk.
 */
export class AssetOrchestrator {
  private readonly handles: Promise<Settled>[] = [];
  private readonly ids = new Set<AssetId>();
  private readonly failurePolicy: KilnFailurePolicy;
  private readonly onComplete?: (completed: CompletedAsset) => void;
  private joined = false;

  constructor(options: OrchestratorOptions = {}) {
    this.failurePolicy = options.failurePolicy ?? "fail-fast";
    this.onComplete = options.onComplete;
  }

  get size(): number {
    return this.handles.length;
  }

  spawn(asset: Spawnable) {
    this.track(asset.id);
    const { id, kind } = asset;
    // Settled handles never reject, so a sibling failing after a fail-fast
    // rejection does not surface as an unhandled rejection.
    const handle = asset.spawn().then(
      (output): Settled => {
        try {
          this.onComplete?.({ id, output });
        } catch (err) {
          return { ok: false, id, error: wrap(id, err, kind) };
        }
        return { ok: true, id, output };
      },
      (err: unknown): Settled => ({ ok: false, id, error: wrap(id, err, kind) })
    );
    this.handles.push(handle);
  }

  /** Register an asset that failed before it could be spawned. */
  fail(id: AssetId, err: unknown, label?: string) {
    this.track(id);
    this.handles.push(Promise.resolve({ ok: false, id, error: wrap(id, err, label) }));
  }

  /**
   * Wait for the spawned assets. Resolves with one entry per asset, in
   * completion order, or rejects according to the failure policy.
   */
  join(): Promise<CompletedAsset[]> {
    if (this.joined) {
      return Promise.reject(new Error("orchestrator was already joined"));
    }
    this.joined = true;
    logDebug(`joining ${this.handles.length} asset pipelines (${this.failurePolicy})`);
    return this.failurePolicy === "aggregate" ? this.joinAll() : this.joinFailFast();
  }

  private track(id: AssetId) {
    if (this.joined) {
      throw new Error(`cannot add asset #${id} after join`);
    }
    if (this.ids.has(id)) {
      throw new Error(`asset id ${id} is already in use in this build pass`);
    }
    this.ids.add(id);
  }

  private async joinAll(): Promise<CompletedAsset[]> {
    const completed: CompletedAsset[] = [];
    const failures: AssetBuildError[] = [];
    // Record in settle order rather than spawn order.
    await Promise.all(
      this.handles.map((handle) =>
        handle.then((settled) => {
          if (settled.ok) completed.push({ id: settled.id, output: settled.output });
          else failures.push(settled.error);
        })
      )
    );
    if (failures.length > 0) {
      throw new AssetBuildFailure(failures);
    }
    return completed;
  }

  private joinFailFast(): Promise<CompletedAsset[]> {
    return new Promise((resolve, reject) => {
      const completed: CompletedAsset[] = [];
      let remaining = this.handles.length;
      let failed = false;
      if (remaining === 0) {
        resolve(completed);
        return;
      }
      for (const handle of this.handles) {
        void handle.then((settled) => {
          remaining -= 1;
          if (failed) return;
          if (!settled.ok) {
            failed = true;
            reject(settled.error);
            return;
          }
          completed.push({ id: settled.id, output: settled.output });
          if (remaining === 0) resolve(completed);
        });
      }
    });
  }
}

function wrap(id: AssetId, err: unknown, label?: string): AssetBuildError {
  return err instanceof AssetBuildError ? err : new AssetBuildError(id, err, label);
}
