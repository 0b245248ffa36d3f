import path from "path";
import { settingsSchema } from "./schema.js";
import { envNumber } from "./env.js";
import type { ManifestDocument } from "../manifest/store.js";
import type { BookpressSettings } from "../types.js";

export const DEFAULT_PORT = 8000;

export interface SettingsOverrides {
  port?: number;
  access?: string;
}

/**
 * Command line > environment > manifest > built-in default.
 */
export const loadSettings = (
  document: ManifestDocument,
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): BookpressSettings => {
  const base = document.filePath ? path.dirname(document.filePath) : process.cwd();
  const parsed = settingsSchema.parse({
    port: overrides.port ?? envNumber(env.BOOKPRESS_PORT) ?? DEFAULT_PORT,
    access: overrides.access ?? env.BOOKPRESS_ACCESS ?? "private",
    stylesheets: env.BOOKPRESS_XSL_DIR ?? document.scalar("stylesheets", "xsl"),
    executables: {
      xsltproc: env.BOOKPRESS_XSLTPROC ?? document.scalar("executables/xsltproc", "xsltproc"),
      pdflatex: env.BOOKPRESS_PDFLATEX ?? document.scalar("executables/pdflatex", "pdflatex"),
    },
  });

  return {
    ...parsed,
    stylesheets: path.resolve(base, parsed.stylesheets),
  };
};
