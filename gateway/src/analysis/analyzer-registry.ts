import type { AnalyzerKind } from "@marketlens/shared";
import type { AnalyzerBackend } from "./types.js";

export class AnalyzerRegistry {
  private analyzers = new Map<AnalyzerKind, AnalyzerBackend>();

  register(analyzer: AnalyzerBackend): void {
    if (this.analyzers.has(analyzer.kind)) {
      throw new Error(`Analyzer already registered: ${analyzer.kind}`);
    }
    this.analyzers.set(analyzer.kind, analyzer);
  }

  unregister(kind: AnalyzerKind): void {
    this.analyzers.delete(kind);
  }

  get(kind: AnalyzerKind): AnalyzerBackend | undefined {
    return this.analyzers.get(kind);
  }

  kinds(): AnalyzerKind[] {
    return [...this.analyzers.keys()];
  }
}
