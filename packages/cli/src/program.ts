import path from "path";
import { Command, InvalidArgumentError } from "commander";
import type { LevelWithSilent } from "pino";
import { z, ZodError } from "zod";
import { createXsltBuilder } from "@bookpress/builder";
import {
  accessSchema,
  configureLogger,
  emptyManifest,
  envBool,
  getLogger,
  loadProject,
  loadSettings,
  locateProjectRoot,
  ManifestError,
  resolveLevel,
  resolveTarget,
  targetFormatSchema,
  targetPaths,
  type Diagnostic,
  type TargetOverrides,
  type TargetResolution,
} from "@bookpress/core";
import { PreviewSession, type PreviewSessionOptions } from "@bookpress/dev-server";
import { emitDiagnostics } from "./diagnostics/emitter.js";

export interface CliContext {
  cwd: string;
  write: (text: string) => void;
}

interface GlobalOptions {
  json: boolean;
  verbose: boolean;
}

const defaultJson = envBool(process.env.BOOKPRESS_JSON, false);
const defaultVerbose = envBool(process.env.BOOKPRESS_VERBOSE, false);

const globalOptionsSchema = z.object({
  json: z.boolean().default(defaultJson),
  verbose: z.boolean().default(defaultVerbose),
});

const buildOptionsSchema = z.object({
  format: targetFormatSchema.optional(),
  input: z.string().optional(),
  output: z.string().optional(),
  publication: z.string().optional(),
  xsl: z.string().optional(),
  stringparam: z.record(z.string()).optional(),
  clean: z.boolean().default(false),
});

const viewOptionsSchema = z.object({
  access: accessSchema.optional(),
  port: z.number().int().min(0).max(65535).optional(),
  directory: z.string().optional(),
  watch: z.boolean().default(false),
  build: z.boolean().default(false),
});

const resolveLoggerLevel = (globals: GlobalOptions): LevelWithSilent => {
  if (globals.verbose) return "debug";
  if (globals.json) return "silent";
  return resolveLevel(process.env.BOOKPRESS_LOG_LEVEL);
};

const getGlobalOptions = (command: Command): GlobalOptions => globalOptionsSchema.parse(command.optsWithGlobals());

export const collectStringParam = (value: string, previous: Record<string, string> | undefined) => {
  const separator = value.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}".`);
  }
  return { ...(previous ?? {}), [value.slice(0, separator)]: value.slice(separator + 1) };
};

const parsePort = (value: string): number => {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || String(port) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a port number, got "${value}".`);
  }
  return port;
};

export const describeNotFound = (
  resolution: Extract<TargetResolution, { status: "not-found" }>,
  manifestPath: string | null,
): Diagnostic => {
  const base = { code: "BP_DIAG_TARGET_NOT_FOUND", severity: "error" as const, location: manifestPath ?? undefined };
  switch (resolution.reason) {
    case "alias-missing":
      return { ...base, message: `Target ${resolution.alias ?? ""} could not be found in the project manifest.` };
    case "no-targets":
      return { ...base, message: "The project manifest does not define any targets." };
    case "no-manifest":
      return resolution.alias === undefined
        ? {
            ...base,
            message: "No project manifest was found and no target options were supplied; nothing to build.",
            suggestion: "Run from inside a project or pass --format and --input.",
          }
        : { ...base, message: `Target ${resolution.alias} could not be found: no project manifest was found.` };
  }
};

const isPortAccessError = (err: unknown) => {
  const code = typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
  return code === "EADDRINUSE" || code === "EACCES" || code === "EPERM";
};

/** Configuration problems become diagnostics; anything else is left to propagate. */
export const toDiagnostics = (err: unknown): Diagnostic[] | null => {
  if (err instanceof ManifestError) {
    return [err.toDiagnostic()];
  }
  if (err instanceof ZodError) {
    return err.issues.map((issue): Diagnostic => ({
      code: "BP_DIAG_CONFIG_INVALID",
      severity: "error",
      message: `${issue.path.join(".") || "value"}: ${issue.message}`,
    }));
  }
  if (isPortAccessError(err)) {
    return [{ code: "BP_DIAG_PORT_UNAVAILABLE", severity: "error", message: `Preview server could not bind: ${String(err)}` }];
  }
  return null;
};

const toOverrides = (options: z.infer<typeof buildOptionsSchema>): TargetOverrides => ({
  format: options.format,
  source: options.input,
  outputDir: options.output,
  publication: options.publication,
  xslPath: options.xsl,
  stringParams: options.stringparam,
});

export const createProgram = (context: CliContext = { cwd: process.cwd(), write: (text) => process.stdout.write(text) }) => {
  const resolveFromCwd = (value: string) => path.resolve(context.cwd, value);

  const fail = (command: string, globals: GlobalOptions, diagnostics: Diagnostic[]) => {
    emitDiagnostics({ command, diagnostics, success: false, json: globals.json, logger: getLogger(), write: context.write });
    process.exitCode = 1;
  };

  const runCommand = async (name: string, command: Command, action: (globals: GlobalOptions) => Promise<void>) => {
    const globals = getGlobalOptions(command);
    try {
      await action(globals);
    } catch (err) {
      const diagnostics = toDiagnostics(err);
      if (!diagnostics) throw err;
      fail(name, globals, diagnostics);
    }
  };

  const runSession = async (options: PreviewSessionOptions) => {
    const logger = getLogger();
    const session = new PreviewSession(options);
    const controller = new AbortController();
    let interrupts = 0;
    const onSignal = () => {
      interrupts += 1;
      if (interrupts === 1) {
        controller.abort();
        return;
      }
      logger.warn("Already shutting down");
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
    try {
      await session.run(controller.signal);
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  };

  const program = new Command();
  program.name("bookpress").description("Build and preview document projects").version("0.1.0");
  program
    .option("--json", "Emit results and diagnostics as JSON", defaultJson)
    .option("--verbose", "Enable verbose logging", defaultVerbose);

  program.hook("preAction", async (_thisCommand, actionCommand) => {
    const globals = getGlobalOptions(actionCommand);
    const root = await locateProjectRoot(context.cwd);
    configureLogger({
      level: resolveLoggerLevel(globals),
      logFile: root ? path.join(root, "cli.log") : undefined,
    });
    const logger = getLogger();
    if (root) {
      logger.info({ root }, `Project found in ${root}`);
    } else {
      logger.info("No existing project found.");
    }
  });

  program
    .command("targets")
    .description("List the build targets defined in the project manifest")
    .action(async (_opts: unknown, command: Command) => {
      await runCommand("targets", command, async (globals) => {
        const project = await loadProject(context.cwd);
        const names = project.targetNames();
        if (globals.json) {
          context.write(`${JSON.stringify({ command: "targets", root: project.root, targets: names }, null, 2)}\n`);
          return;
        }
        if (!project.root) {
          getLogger().warn("No project manifest found; there are no targets to list.");
          return;
        }
        names.forEach((name) => context.write(`${name}\n`));
      });
    });

  program
    .command("build [target]")
    .description("Build the named target (default: the first target in the manifest)")
    .option("-f, --format <format>", "Output format (html, latex, pdf)")
    .option("-i, --input <path>", "Path to the main source file")
    .option("-o, --output <path>", "Directory to build files into")
    .option("-p, --publication <path>", "Path to the publication file")
    .option("-x, --xsl <path>", "Path to a custom xsl file")
    .option("--stringparam <key=value>", "Pass a string parameter to the conversion (repeatable)", collectStringParam)
    .option("--clean", "Empty the output directory before building")
    .action(async (targetName: string | undefined, opts: unknown, command: Command) => {
      await runCommand("build", command, async (globals) => {
        const logger = getLogger();
        const options = buildOptionsSchema.parse(opts);
        const project = await loadProject(context.cwd);
        const overrides = toOverrides({
          ...options,
          input: options.input === undefined ? undefined : resolveFromCwd(options.input),
          output: options.output === undefined ? undefined : resolveFromCwd(options.output),
          publication: options.publication === undefined ? undefined : resolveFromCwd(options.publication),
          xsl: options.xsl === undefined ? undefined : resolveFromCwd(options.xsl),
        });

        if (project.document.synthetic) {
          logger.warn("No project manifest was found. Continuing using command-line arguments.");
        } else if (targetName === undefined) {
          logger.info("Since no build target was supplied, the first target of the manifest will be built.");
        }

        const resolution = resolveTarget(project.document, targetName, overrides);
        if (resolution.status === "not-found") {
          fail("build", globals, [describeNotFound(resolution, project.document.filePath)]);
          return;
        }

        const settings = loadSettings(project.document);
        const builder = createXsltBuilder({ project: project.withTargets([resolution.target]), settings, logger });
        const report = await builder.build(resolution.target.name, options.clean);
        emitDiagnostics({
          command: "build",
          diagnostics: report.diagnostics,
          success: report.success,
          json: globals.json,
          logger,
          write: context.write,
          context: { target: report.target, outputDir: report.outputDir },
        });
        if (!report.success) {
          process.exitCode = 1;
        }
      });
    });

  program
    .command("view [target]")
    .description("Serve a built target locally, optionally rebuilding it on change")
    .option("-a, --access <access>", "private (this computer only) or public (local network)")
    .option("-p, --port <port>", "Port for the local server", parsePort)
    .option("-d, --directory <path>", "Serve this directory instead of a target's output")
    .option("-b, --build", "Build the target before starting the server")
    .option("-w, --watch", "Build, then rebuild the target whenever its sources change (HTML targets only)")
    .action(async (targetName: string | undefined, opts: unknown, command: Command) => {
      await runCommand("view", command, async (globals) => {
        const logger = getLogger();
        const options = viewOptionsSchema.parse(opts);
        const overrides = { port: options.port, access: options.access };

        // Serving a plain directory needs no target, so the manifest is not read.
        if (options.directory !== undefined) {
          const settings = loadSettings(emptyManifest(logger), overrides);
          await runSession({ directory: resolveFromCwd(options.directory), access: settings.access, port: settings.port });
          return;
        }

        const project = await loadProject(context.cwd);
        const settings = loadSettings(project.document, overrides);

        const resolution = resolveTarget(project.document, targetName);
        if (resolution.status === "not-found") {
          fail("view", globals, [describeNotFound(resolution, project.document.filePath)]);
          return;
        }
        const { target } = resolution;

        if (options.watch && target.format !== "html") {
          fail("view", globals, [
            {
              code: "BP_DIAG_WATCH_UNSUPPORTED",
              severity: "error",
              message: `Watching is only supported for HTML targets; ${target.name} builds ${target.format}.`,
            },
          ]);
          return;
        }

        let watch: PreviewSessionOptions["watch"] = null;
        if (options.build || options.watch) {
          const builder = createXsltBuilder({ project: project.withTargets([target]), settings, logger });
          const report = await builder.build(target.name);
          if (!report.success) {
            emitDiagnostics({
              command: "view",
              diagnostics: report.diagnostics,
              success: false,
              json: globals.json,
              logger,
              write: context.write,
            });
          }
          if (options.watch) {
            watch = { target, builder };
          }
        }

        await runSession({
          directory: targetPaths(target).outputDir,
          access: settings.access,
          port: settings.port,
          watch,
          logger,
        });
      });
    });

  return program;
};
