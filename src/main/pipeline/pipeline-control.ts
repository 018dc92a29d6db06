/**
 * Run-wide cancel switch. Workers check it before picking up a key; keys already running
 * are left to finish.
 */
export class PipelineControl {
  private _cancelled = false;

  get cancelled(): boolean {
    return this._cancelled;
  }

  cancel(): void {
    this._cancelled = true;
  }

  reset(): void {
    this._cancelled = false;
  }
}
