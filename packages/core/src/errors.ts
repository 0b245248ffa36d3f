import type { Diagnostic } from "./types.js";

export type ManifestErrorCode = "BP_DIAG_MANIFEST_INVALID" | "BP_DIAG_TARGET_FORMAT_INVALID";

export class ManifestError extends Error {
  readonly code: ManifestErrorCode;
  readonly location: string;

  constructor(code: ManifestErrorCode, message: string, location: string) {
    super(message);
    this.name = "ManifestError";
    this.code = code;
    this.location = location;
  }

  toDiagnostic(): Diagnostic {
    return { code: this.code, severity: "error", message: this.message, location: this.location };
  }
}
