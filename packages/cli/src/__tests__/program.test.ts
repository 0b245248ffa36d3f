import os from "os";
import path from "path";
import fs from "fs-extra";
import { mkdtemp } from "fs/promises";
import { InvalidArgumentError } from "commander";
import pino from "pino";
import { z } from "zod";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ManifestError } from "@bookpress/core";
import { collectStringParam, createProgram, describeNotFound, toDiagnostics } from "../program.js";
import { emitDiagnostics } from "../diagnostics/emitter.js";

const MANIFEST = `<project>
  <targets>
    <target><alias>web</alias><format>html</format></target>
    <target><alias>print</alias><format>pdf</format></target>
  </targets>
</project>`;

interface LogLine {
  level: number;
  msg: string;
  code?: string;
}

describe("collectStringParam", () => {
  it("accumulates key=value pairs and keeps later values", () => {
    const first = collectStringParam("a=1", undefined);
    const second = collectStringParam("b=x=y", first);
    expect(collectStringParam("a=2", second)).toEqual({ a: "2", b: "x=y" });
  });

  it("accepts an empty value", () => {
    expect(collectStringParam("draft=", undefined)).toEqual({ draft: "" });
  });

  it("rejects pairs without a key", () => {
    expect(() => collectStringParam("novalue", undefined)).toThrow(InvalidArgumentError);
    expect(() => collectStringParam("=1", undefined)).toThrow('Expected key=value, got "=1".');
  });
});

describe("describeNotFound", () => {
  it("names the missing alias", () => {
    expect(describeNotFound({ status: "not-found", reason: "alias-missing", alias: "nope" }, "/proj/project.ptx")).toEqual({
      code: "BP_DIAG_TARGET_NOT_FOUND",
      severity: "error",
      location: "/proj/project.ptx",
      message: "Target nope could not be found in the project manifest.",
    });
  });

  it("explains that nothing can be built without a manifest", () => {
    const diagnostic = describeNotFound({ status: "not-found", reason: "no-manifest" }, null);
    expect(diagnostic.message).toBe("No project manifest was found and no target options were supplied; nothing to build.");
    expect(diagnostic.location).toBeUndefined();
  });
});

describe("toDiagnostics", () => {
  it("converts manifest errors", () => {
    const err = new ManifestError("BP_DIAG_MANIFEST_INVALID", "Malformed manifest", "/proj/project.ptx");
    expect(toDiagnostics(err)).toEqual([err.toDiagnostic()]);
  });

  it("converts invalid settings", () => {
    const result = z.object({ port: z.number() }).safeParse({ port: "x" });
    if (result.success) throw new Error("expected a validation failure");
    const diagnostics = toDiagnostics(result.error);
    expect(diagnostics?.[0]).toMatchObject({ code: "BP_DIAG_CONFIG_INVALID", severity: "error" });
    expect(diagnostics?.[0].message.startsWith("port: ")).toBe(true);
  });

  it("converts a port that cannot be bound", () => {
    const err = Object.assign(new Error("listen EADDRINUSE"), { code: "EADDRINUSE" });
    expect(toDiagnostics(err)?.[0].code).toBe("BP_DIAG_PORT_UNAVAILABLE");
  });

  it("leaves other errors alone", () => {
    expect(toDiagnostics(new Error("boom"))).toBeNull();
  });
});

describe("emitDiagnostics", () => {
  it("writes a JSON payload", () => {
    let output = "";
    emitDiagnostics({
      command: "build",
      diagnostics: [],
      success: true,
      json: true,
      logger: pino({ level: "silent" }),
      write: (text) => {
        output += text;
      },
      context: { target: "web" },
    });
    expect(JSON.parse(output)).toEqual({ command: "build", success: true, diagnostics: [], context: { target: "web" } });
  });

  it("logs each diagnostic at its severity", () => {
    const lines: LogLine[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => void lines.push(JSON.parse(line)) });
    emitDiagnostics({
      command: "build",
      diagnostics: [
        { code: "BP_DIAG_A", severity: "warning", message: "first" },
        { code: "BP_DIAG_B", severity: "error", message: "second" },
      ],
      success: false,
      json: false,
      logger,
    });
    expect(lines.map((line) => [line.level, line.msg])).toEqual([
      [40, "first"],
      [50, "second"],
      [50, "Command completed with diagnostics"],
    ]);
  });
});

describe("createProgram", () => {
  let root: string;
  let output: string;

  const run = async (...args: string[]) => {
    const program = createProgram({ cwd: root, write: (text) => (output += text) });
    program.exitOverride();
    await program.parseAsync(args, { from: "user" });
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "bookpress-cli-"));
    output = "";
    process.exitCode = undefined;
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await fs.remove(root);
  });

  it("lists targets in manifest order", async () => {
    await fs.writeFile(path.join(root, "project.ptx"), MANIFEST);
    await run("targets");
    expect(output).toBe("web\nprint\n");
  });

  it("lists targets as JSON", async () => {
    await fs.writeFile(path.join(root, "project.ptx"), MANIFEST);
    await fs.ensureDir(path.join(root, "sub"));
    root = path.join(root, "sub");
    await run("--json", "targets");
    root = path.dirname(root);
    expect(JSON.parse(output)).toEqual({ command: "targets", root, targets: ["web", "print"] });
  });

  it("fails a build of an unknown target", async () => {
    await fs.writeFile(path.join(root, "project.ptx"), MANIFEST);
    await run("--json", "build", "nope");

    expect(process.exitCode).toBe(1);
    expect(JSON.parse(output)).toEqual({
      command: "build",
      success: false,
      diagnostics: [
        {
          code: "BP_DIAG_TARGET_NOT_FOUND",
          severity: "error",
          location: path.join(root, "project.ptx"),
          message: "Target nope could not be found in the project manifest.",
        },
      ],
    });
  });

  it("refuses to build without a manifest or target options", async () => {
    await run("--json", "build");
    expect(process.exitCode).toBe(1);
    expect(JSON.parse(output).diagnostics[0].suggestion).toBe("Run from inside a project or pass --format and --input.");
  });

  it("reports an unsupported format in the manifest", async () => {
    await fs.writeFile(
      path.join(root, "project.ptx"),
      "<project><targets><target><alias>doc</alias><format>docx</format></target></targets></project>",
    );
    await run("--json", "build", "doc");
    expect(process.exitCode).toBe(1);
    expect(JSON.parse(output).diagnostics[0].code).toBe("BP_DIAG_TARGET_FORMAT_INVALID");
  });

  it("refuses to watch a target that does not build html", async () => {
    await fs.writeFile(path.join(root, "project.ptx"), MANIFEST);
    await run("--json", "view", "print", "--watch");
    expect(process.exitCode).toBe(1);
    expect(JSON.parse(output).diagnostics[0]).toMatchObject({
      code: "BP_DIAG_WATCH_UNSUPPORTED",
      message: "Watching is only supported for HTML targets; print builds pdf.",
    });
  });

  it("keeps valid targets usable next to an invalid one", async () => {
    await fs.writeFile(
      path.join(root, "project.ptx"),
      `<project><targets>
        <target><alias>web</alias><format>html</format></target>
        <target><alias>doc</alias><format>docx</format></target>
      </targets></project>`,
    );

    await run("targets");
    expect(output).toBe("web\ndoc\n");

    output = "";
    await run("--json", "build", "web");
    expect(JSON.parse(output).diagnostics[0].code).toBe("BP_DIAG_SOURCE_MISSING");
  });

  it("serves a directory without reading the manifest", async () => {
    await fs.writeFile(path.join(root, "project.ptx"), "<project><targets></project>");
    await fs.outputFile(path.join(root, "out", "index.html"), "<h1>Out</h1>");
    const listeners = process.listenerCount("SIGINT");

    const viewing = run("--json", "view", "--directory", "out", "--port", "0");
    await vi.waitFor(() => expect(process.listenerCount("SIGINT")).toBe(listeners + 1));
    process.emit("SIGINT", "SIGINT");
    await viewing;

    expect(process.exitCode).toBeUndefined();
    expect(output).toBe("");
    expect(process.listenerCount("SIGINT")).toBe(listeners);
  });
});
