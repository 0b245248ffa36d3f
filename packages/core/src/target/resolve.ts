import path from "path";
import { targetFormatSchema } from "../config/schema.js";
import { ManifestError } from "../errors.js";
import type { ManifestNode } from "../manifest/node.js";
import type { ManifestDocument } from "../manifest/store.js";
import type { Target, TargetFormat, TargetOverrides, TargetResolution } from "../types.js";

export const TARGET_DEFAULTS = {
  format: "html",
  source: path.join("source", "main.ptx"),
  publication: path.join("publication", "publication.ptx"),
} as const;

export const defaultOutputDir = (name: string): string => path.join("output", name);

const readFormat = (node: ManifestNode, location: string): TargetFormat | null => {
  const value = node.childText("format");
  if (value === null || value === "") return null;
  const parsed = targetFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new ManifestError(
      "BP_DIAG_TARGET_FORMAT_INVALID",
      `Target ${node.childText("alias") ?? "(unnamed)"} has unsupported format "${value}" (expected ${targetFormatSchema.options.join(", ")})`,
      location,
    );
  }
  return parsed.data;
};

const readStringParams = (node: ManifestNode): Record<string, string> => {
  const params: Record<string, string> = {};
  for (const entry of node.children("stringparam")) {
    const key = entry.attribute("key");
    if (key === null) continue;
    params[key] = entry.attribute("value") ?? "";
  }
  return params;
};

/** An empty path element counts as absent, so the default applies. */
const readPath = (node: ManifestNode | null, name: string): string | null => node?.childText(name) || null;

export interface ResolveTargetNodeOptions {
  projectRoot?: string | null;
  /** Reported as the location of manifest errors. */
  location?: string;
}

/**
 * Builds a target from a manifest `<target>` element (or none) and command-line overrides.
 * A supplied override wins; otherwise the manifest value; otherwise the default.
 */
export const resolveTargetNode = (
  node: ManifestNode | null,
  overrides: TargetOverrides = {},
  options: ResolveTargetNodeOptions = {},
): Target => {
  const location = options.location ?? "command line";
  const manifestFormat = node ? readFormat(node, location) : null;
  const format = overrides.format ?? manifestFormat ?? TARGET_DEFAULTS.format;
  const name = node?.childText("alias") || format;

  const target: Target = {
    name,
    format,
    source: overrides.source ?? readPath(node, "source") ?? TARGET_DEFAULTS.source,
    outputDir: overrides.outputDir ?? readPath(node, "output-dir") ?? defaultOutputDir(name),
    publication: overrides.publication ?? readPath(node, "publication") ?? TARGET_DEFAULTS.publication,
    xslPath: overrides.xslPath ?? readPath(node, "xsl") ?? null,
    stringParams: Object.freeze({
      ...(node ? readStringParams(node) : {}),
      ...(overrides.stringParams ?? {}),
    }),
    projectRoot: options.projectRoot ?? null,
    raw: node,
  };
  return Object.freeze(target);
};

const hasOverrides = (overrides: TargetOverrides): boolean =>
  Object.values(overrides).some((value) => value !== undefined);

export const resolveTarget = (
  document: ManifestDocument,
  alias: string | undefined,
  overrides: TargetOverrides = {},
): TargetResolution => {
  if (document.synthetic) {
    if (alias === undefined && hasOverrides(overrides)) {
      return { status: "resolved", target: resolveTargetNode(null, overrides) };
    }
    return { status: "not-found", reason: "no-manifest", alias };
  }

  const node = document.targetElement(alias);
  if (!node) {
    return alias === undefined
      ? { status: "not-found", reason: "no-targets" }
      : { status: "not-found", reason: "alias-missing", alias };
  }

  const projectRoot = document.filePath ? path.dirname(document.filePath) : null;
  return {
    status: "resolved",
    target: resolveTargetNode(node, overrides, { projectRoot, location: document.filePath ?? undefined }),
  };
};

const resolveAgainst = (target: Target, value: string): string =>
  path.resolve(target.projectRoot ?? process.cwd(), value);

export interface ResolvedTargetPaths {
  source: string;
  outputDir: string;
  publication: string;
  xslPath: string | null;
}

export const targetPaths = (target: Target): ResolvedTargetPaths => ({
  source: resolveAgainst(target, target.source),
  outputDir: resolveAgainst(target, target.outputDir),
  publication: resolveAgainst(target, target.publication),
  xslPath: target.xslPath === null ? null : resolveAgainst(target, target.xslPath),
});

/** The target's string parameters with `publisher` pointing at its publication file. */
export const buildStringParams = (target: Target): Record<string, string> => ({
  ...target.stringParams,
  publisher: targetPaths(target).publication,
});
