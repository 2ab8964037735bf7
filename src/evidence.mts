// Evidence breadcrumbs shown beside the assistant's answer.

export type EvidenceEntry = { source: string; detail: string } & Record<string, unknown>;

export interface EvidenceSink {
  add(source: string, detail: string, extra?: Record<string, unknown>): void;
}

/** Sources the evidence panel is allowed to surface. */
export const EVIDENCE_ALLOWED_SOURCES: ReadonlySet<string> = new Set([
  "dataset",        // similar-case hits during triage
  "triage_rules",
  "triage_kb",
  "whatif_calc",
  "whatif_dataset",
  "medsx_dataset",
  "medsx_rules",
]);

export class EvidenceLog implements EvidenceSink {
  private items: EvidenceEntry[] = [];

  add(source: string, detail: string, extra: Record<string, unknown> = {}): void {
    this.items.push({...extra, source, detail});
  }

  get size() {
    return this.items.length;
  }

  /**
   * Copy of the recorded entries, optionally filtered to `allowedSources`.
   * With `clear`, the whole log is emptied once something was returned.
   */
  snapshot(opts?: { clear?: boolean; allowedSources?: ReadonlySet<string> }): EvidenceEntry[] {
    const {clear = true, allowedSources} = opts ?? {};
    const out = this.items
      .filter(i => !allowedSources || allowedSources.has(i.source))
      .map(i => ({...i}));
    if (clear && out.length) {
      this.items = [];
    }
    return out;
  }
}
