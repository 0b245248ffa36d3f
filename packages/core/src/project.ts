import path from "path";
import { getLogger, type Reporter } from "./logger/index.js";
import { locateProjectRoot, MANIFEST_FILENAME } from "./manifest/locate.js";
import { loadManifest, type ManifestDocument } from "./manifest/store.js";
import { resolveTarget } from "./target/resolve.js";
import type { Target } from "./types.js";

/**
 * A project root and its manifest. Targets are resolved on demand, so a broken target only
 * fails the commands that ask for it.
 */
export class Project {
  private readonly explicit: readonly Target[] | null;

  constructor(
    readonly root: string | null,
    readonly document: ManifestDocument,
    targets?: readonly Target[],
  ) {
    this.explicit = targets ? Object.freeze([...targets]) : null;
  }

  /** Copy of this project holding only `targets`, e.g. after command-line overrides. */
  withTargets(targets: readonly Target[]): Project {
    return new Project(this.root, this.document, targets);
  }

  /** With no name, the first target. Throws `ManifestError` when the matching target is invalid. */
  target(name?: string): Target | null {
    if (this.explicit) {
      if (name === undefined) return this.explicit[0] ?? null;
      return this.explicit.find((target) => target.name === name) ?? null;
    }
    const resolution = resolveTarget(this.document, name);
    return resolution.status === "resolved" ? resolution.target : null;
  }

  targetNames(): string[] {
    return this.explicit ? this.explicit.map((target) => target.name) : this.document.aliases();
  }
}

export interface LoadProjectOptions {
  filename?: string;
  logger?: Reporter;
}

export const loadProject = async (startDir: string = process.cwd(), options: LoadProjectOptions = {}) => {
  const logger = options.logger ?? getLogger();
  const filename = options.filename ?? MANIFEST_FILENAME;
  const root = await locateProjectRoot(startDir, filename);
  if (root === null) {
    logger.debug({ startDir: path.resolve(startDir), filename }, "No project manifest found");
  }
  const document = await loadManifest(root, { filename, logger });
  return new Project(root, document);
};
