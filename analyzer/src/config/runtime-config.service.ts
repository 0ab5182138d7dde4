import type { AnalyzerConfigDocument } from "./config-document";

/**
 * The validated configuration of one analysis run. Registered by value in
 * `AnalyzerServicesModule.register`; every reader gets its own copy.
 */
export class RuntimeConfigService {
  constructor(private readonly document: AnalyzerConfigDocument) {
  }

  getDocument(): AnalyzerConfigDocument {
    return structuredClone(this.document);
  }

  get inputFile(): string {
    return this.document.input.file;
  }

  /** Where the viewer goes, or `null` when no visualization was requested. */
  get outputDir(): string | null {
    const dir = this.document.output.dir.trim();
    return dir.length > 0 ? dir : null;
  }
}
