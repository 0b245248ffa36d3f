import type { Diagnostic, Reporter } from "@bookpress/core";

export interface EmitDiagnosticsOptions {
  command: string;
  diagnostics: Diagnostic[];
  success: boolean;
  json: boolean;
  logger: Reporter;
  write?: (text: string) => void;
  context?: Record<string, unknown>;
}

const logDiagnostic = (logger: Reporter, command: string, diagnostic: Diagnostic) => {
  const fields = {
    command,
    code: diagnostic.code,
    location: diagnostic.location,
    details: diagnostic.details,
    suggestion: diagnostic.suggestion,
  };
  if (diagnostic.severity === "error") {
    logger.error(fields, diagnostic.message);
  } else if (diagnostic.severity === "warning") {
    logger.warn(fields, diagnostic.message);
  } else {
    logger.info(fields, diagnostic.message);
  }
};

export const emitDiagnostics = (options: EmitDiagnosticsOptions) => {
  const { command, diagnostics, success, json, logger, context } = options;
  const write = options.write ?? ((text: string) => process.stdout.write(text));

  if (json) {
    const payload: Record<string, unknown> = {
      command,
      success,
      diagnostics,
    };
    if (context) payload.context = context;
    write(`${JSON.stringify(payload, null, 2)}\n`);
    return;
  }

  if (diagnostics.length === 0) {
    logger.debug({ command, ...(context ?? {}) }, "No diagnostics reported");
    return;
  }

  diagnostics.forEach((diag) => logDiagnostic(logger, command, diag));
  if (!success) {
    logger.error({ command }, "Command completed with diagnostics");
  }
};
