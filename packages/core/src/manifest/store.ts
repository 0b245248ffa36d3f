import fs from "fs-extra";
import path from "path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ManifestError } from "../errors.js";
import { getLogger, type Reporter } from "../logger/index.js";
import { MANIFEST_FILENAME } from "./locate.js";
import { ManifestNode, xmlParserOptions } from "./node.js";

const ROOT_ELEMENT = "project";
const TARGETS_PATH = "targets/target";

export interface LoadManifestOptions {
  filename?: string;
  logger?: Reporter;
}

export class ManifestDocument {
  constructor(
    readonly root: ManifestNode,
    /** Manifest file path; `null` for the synthetic document used when no manifest exists. */
    readonly filePath: string | null,
    private readonly logger: Reporter,
  ) {}

  get synthetic(): boolean {
    return this.filePath === null;
  }

  targetElements(): ManifestNode[] {
    return this.root.findAll(TARGETS_PATH);
  }

  aliases(): string[] {
    return this.targetElements()
      .map((node) => node.childText("alias"))
      .filter((alias): alias is string => alias !== null && alias.length > 0);
  }

  /** With no alias, the first target in document order. */
  targetElement(alias?: string): ManifestNode | null {
    const targets = this.targetElements();
    if (alias === undefined) {
      return targets[0] ?? null;
    }
    const match = targets.find((node) => node.childText("alias") === alias);
    if (!match) {
      this.logger.info({ alias, manifest: this.filePath }, `No targets with alias ${alias} found in project manifest`);
      return null;
    }
    return match;
  }

  scalar(elementPath: string, fallback: string): string {
    return this.root.find(elementPath)?.text() ?? fallback;
  }
}

export const emptyManifest = (logger: Reporter = getLogger()): ManifestDocument =>
  new ManifestDocument(new ManifestNode(ROOT_ELEMENT, {}), null, logger);

export const parseManifest = (xml: string, filePath: string, logger: Reporter = getLogger()): ManifestDocument => {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ManifestError(
      "BP_DIAG_MANIFEST_INVALID",
      `Malformed manifest ${filePath} (line ${line}, column ${col}): ${msg}`,
      filePath,
    );
  }

  const parsed: unknown = new XMLParser(xmlParserOptions).parse(xml);
  const root = new ManifestNode("#document", parsed).child(ROOT_ELEMENT);
  if (!root) {
    throw new ManifestError(
      "BP_DIAG_MANIFEST_INVALID",
      `Manifest ${filePath} has no <${ROOT_ELEMENT}> root element`,
      filePath,
    );
  }
  return new ManifestDocument(root, filePath, logger);
};

/**
 * Loads `<root>/project.ptx`, or an empty synthetic manifest when `root` is `null`.
 */
export const loadManifest = async (
  root: string | null,
  options: LoadManifestOptions = {},
): Promise<ManifestDocument> => {
  const logger = options.logger ?? getLogger();
  if (root === null) {
    return emptyManifest(logger);
  }
  const filePath = path.join(root, options.filename ?? MANIFEST_FILENAME);
  const xml = await fs.readFile(filePath, "utf8");
  return parseManifest(xml, filePath, logger);
};
