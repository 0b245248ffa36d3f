import type { ManifestNode } from "./manifest/node.js";

export type Severity = "info" | "warning" | "error";

export interface Diagnostic {
  code: string;
  severity: Severity;
  message: string;
  details?: string;
  location?: string;
  suggestion?: string;
}

export type TargetFormat = "html" | "latex" | "pdf";

export type Access = "private" | "public";

export interface Target {
  readonly name: string;
  readonly format: TargetFormat;
  readonly source: string;
  readonly outputDir: string;
  readonly publication: string;
  readonly xslPath: string | null;
  readonly stringParams: Readonly<Record<string, string>>;
  /** Root of the project the target was read from; `null` for command-line targets. */
  readonly projectRoot: string | null;
  readonly raw: ManifestNode | null;
}

/**
 * Command-line values for a target. `undefined` means "not supplied";
 * any other value, the empty string included, replaces the manifest value.
 */
export interface TargetOverrides {
  format?: TargetFormat;
  source?: string;
  outputDir?: string;
  publication?: string;
  xslPath?: string;
  stringParams?: Record<string, string>;
}

export type NotFoundReason = "alias-missing" | "no-targets" | "no-manifest";

export type TargetResolution =
  | { status: "resolved"; target: Target }
  | { status: "not-found"; reason: NotFoundReason; alias?: string };

export interface BookpressSettings {
  port: number;
  access: Access;
  stylesheets: string;
  executables: {
    xsltproc: string;
    pdflatex: string;
  };
}
