import { logDebug } from "@cli/utils/logger";
import { AssetBuildError, AssetBuildFailure } from "@core/errors";
import type { AssetOutput } from "@core/pipelines";
import type { AssetId } from "@core/pipelines/shared";

/**
 * Applies asset outputs to one document, strictly one at a time, in the
 * order they are pushed. Pipelines build concurrently; only this queue ever
 * touches the document.
 */
export class FinalizeQueue {
  private tail: Promise<void> = Promise.resolve();
  private readonly errors: AssetBuildError[] = [];
  private readonly finalized: AssetId[] = [];

  constructor(private readonly dom: Document) {}

  push(output: AssetOutput) {
    this.tail = this.tail.then(async () => {
      try {
        await output.finalize(this.dom);
        this.finalized.push(output.id);
        logDebug(`#${output.id} ${output.kind}: finalized`);
      } catch (err) {
        this.errors.push(new AssetBuildError(output.id, err, `finalize ${output.kind}`));
      }
    });
  }

  /** Wait for every pushed output. Resolves with the ids in the order they were applied. */
  async flush(): Promise<AssetId[]> {
    await this.tail;
    if (this.errors.length === 1) throw this.errors[0];
    if (this.errors.length > 1) throw new AssetBuildFailure([...this.errors]);
    return [...this.finalized];
  }
}
