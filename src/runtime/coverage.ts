/** Ids whose call site was reached during the current run. */
export class CoverageMap {
  private covered = new Set<number>();

  /** Marks every id of a site's block; the base id is always marked. */
  markBlock(baseId: number, count: number): void {
    if (this.covered.has(baseId)) return;
    this.covered.add(baseId);
    for (let offset = 1; offset < count; offset++) {
      this.covered.add(baseId + offset);
    }
  }

  isCovered(id: number): boolean {
    return this.covered.has(id);
  }

  get size(): number {
    return this.covered.size;
  }

  ids(): number[] {
    return [...this.covered].sort((a, b) => a - b);
  }

  reset(): void {
    this.covered.clear();
  }
}
