import path from "path";
import pino from "pino";
import { describe, expect, it } from "vitest";
import { ManifestError } from "../errors.js";
import { emptyManifest, parseManifest } from "../manifest/store.js";
import { Project } from "../project.js";
import { buildStringParams, resolveTarget, resolveTargetNode, targetPaths } from "../target/resolve.js";

const logger = pino({ level: "silent" });

const manifest = (targets: string) =>
  parseManifest(`<project><targets>${targets}</targets></project>`, "/proj/project.ptx", logger);

const MAIN = `
  <target>
    <alias>main</alias>
    <format>html</format>
    <source>main.ptx</source>
    <output-dir>output/web</output-dir>
    <publication>publication/web.ptx</publication>
    <stringparam key="a" value="1"/>
    <stringparam key="b" value="2"/>
  </target>`;

describe("resolveTargetNode", () => {
  it("lets a supplied override win and keeps the other manifest fields", () => {
    const node = manifest(MAIN).targetElement("main");
    const target = resolveTargetNode(node, { format: "pdf" });

    expect(target.format).toBe("pdf");
    expect(target.source).toBe("main.ptx");
    expect(target.outputDir).toBe("output/web");
    expect(target.name).toBe("main");
  });

  it("merges string parameters key by key", () => {
    const node = manifest(MAIN).targetElement("main");
    const target = resolveTargetNode(node, { stringParams: { b: "3", c: "4" } });
    expect(target.stringParams).toEqual({ a: "1", b: "3", c: "4" });
  });

  it("does not erase manifest values with unsupplied overrides", () => {
    const node = manifest(MAIN).targetElement("main");
    const target = resolveTargetNode(node, { source: undefined, stringParams: undefined });
    expect(target.source).toBe("main.ptx");
    expect(target.stringParams).toEqual({ a: "1", b: "2" });
  });

  it("applies an explicitly empty override", () => {
    const node = manifest(MAIN).targetElement("main");
    expect(resolveTargetNode(node, { outputDir: "" }).outputDir).toBe("");
  });

  it("falls back to defaults for missing children", () => {
    const node = manifest("<target><alias>web</alias></target>").targetElement("web");
    const target = resolveTargetNode(node);

    expect(target).toMatchObject({
      name: "web",
      format: "html",
      source: path.join("source", "main.ptx"),
      outputDir: path.join("output", "web"),
      publication: path.join("publication", "publication.ptx"),
      xslPath: null,
      stringParams: {},
    });
  });

  it("treats empty path elements as absent", () => {
    const node = manifest(
      "<target><alias>web</alias><source/><output-dir></output-dir><publication>  </publication><xsl/></target>",
    ).targetElement("web");
    expect(resolveTargetNode(node)).toMatchObject({
      source: path.join("source", "main.ptx"),
      outputDir: path.join("output", "web"),
      publication: path.join("publication", "publication.ptx"),
      xslPath: null,
    });
  });

  it("reads the custom transform path", () => {
    const node = manifest("<target><alias>web</alias><xsl>custom/web.xsl</xsl></target>").targetElement("web");
    expect(resolveTargetNode(node).xslPath).toBe("custom/web.xsl");
  });

  it("produces frozen targets", () => {
    const target = resolveTargetNode(manifest(MAIN).targetElement("main"));
    expect(Object.isFrozen(target)).toBe(true);
    expect(Object.isFrozen(target.stringParams)).toBe(true);
  });

  it("rejects an unsupported manifest format", () => {
    const node = manifest("<target><alias>doc</alias><format>docx</format></target>").targetElement("doc");
    expect(() => resolveTargetNode(node, {}, { location: "/proj/project.ptx" })).toThrow(ManifestError);
    expect(() => resolveTargetNode(node, {}, { location: "/proj/project.ptx" })).toThrow(
      'Target doc has unsupported format "docx" (expected html, latex, pdf)',
    );
  });
});

describe("resolveTarget", () => {
  const twoTargets = manifest(
    "<target><alias>intro</alias></target><target><alias>exercises</alias><format>latex</format></target>",
  );

  it("resolves the named target relative to the project root", () => {
    const resolution = resolveTarget(twoTargets, "exercises");
    expect(resolution.status).toBe("resolved");
    if (resolution.status !== "resolved") return;
    expect(resolution.target.name).toBe("exercises");
    expect(resolution.target.format).toBe("latex");
    expect(resolution.target.projectRoot).toBe("/proj");
  });

  it("resolves the first target when no name is given", () => {
    const resolution = resolveTarget(twoTargets, undefined);
    expect(resolution.status === "resolved" && resolution.target.name).toBe("intro");
  });

  it("reports a missing alias instead of substituting the default", () => {
    expect(resolveTarget(twoTargets, "nope")).toEqual({ status: "not-found", reason: "alias-missing", alias: "nope" });
  });

  it("reports an empty manifest as not found", () => {
    const empty = parseManifest("<project><targets/></project>", "/proj/project.ptx", logger);
    expect(resolveTarget(empty, undefined)).toEqual({ status: "not-found", reason: "no-targets" });
  });

  it("builds a command-line target without a manifest", () => {
    const resolution = resolveTarget(emptyManifest(logger), undefined, { format: "latex", source: "/doc/book.ptx" });
    expect(resolution.status).toBe("resolved");
    if (resolution.status !== "resolved") return;
    expect(resolution.target).toMatchObject({
      name: "latex",
      format: "latex",
      source: "/doc/book.ptx",
      outputDir: path.join("output", "latex"),
      projectRoot: null,
      raw: null,
    });
  });

  it("reports nothing to build without a manifest or overrides", () => {
    expect(resolveTarget(emptyManifest(logger), undefined)).toEqual({
      status: "not-found",
      reason: "no-manifest",
      alias: undefined,
    });
    expect(resolveTarget(emptyManifest(logger), "web", { format: "html" })).toEqual({
      status: "not-found",
      reason: "no-manifest",
      alias: "web",
    });
  });
});

describe("target paths", () => {
  const target = resolveTargetNode(manifest(MAIN).targetElement("main"), {}, { projectRoot: "/proj" });

  it("resolves paths against the project root", () => {
    expect(targetPaths(target)).toEqual({
      source: path.resolve("/proj", "main.ptx"),
      outputDir: path.resolve("/proj", "output/web"),
      publication: path.resolve("/proj", "publication/web.ptx"),
      xslPath: null,
    });
  });

  it("injects the absolute publication path as publisher", () => {
    expect(buildStringParams(target)).toEqual({
      a: "1",
      b: "2",
      publisher: path.resolve("/proj", "publication/web.ptx"),
    });
  });
});

describe("Project", () => {
  const document = manifest(MAIN + "<target><alias>print</alias><format>pdf</format></target>");
  const project = new Project("/proj", document);

  it("owns the manifest targets in order", () => {
    expect(project.targetNames()).toEqual(["main", "print"]);
    expect(project.target()?.name).toBe("main");
    expect(project.target("print")?.format).toBe("pdf");
    expect(project.target("nope")).toBeNull();
  });

  it("resolves a valid target next to an invalid one", () => {
    const mixed = new Project("/proj", manifest(MAIN + "<target><alias>doc</alias><format>docx</format></target>"));
    expect(mixed.targetNames()).toEqual(["main", "doc"]);
    expect(mixed.target("main")?.format).toBe("html");
    expect(() => mixed.target("doc")).toThrow(ManifestError);
  });

  it("can be narrowed to explicit targets", () => {
    const overridden = resolveTargetNode(document.targetElement("print"), { format: "latex" });
    const narrowed = project.withTargets([overridden]);
    expect(narrowed.targetNames()).toEqual(["print"]);
    expect(narrowed.target("print")?.format).toBe("latex");
    expect(narrowed.root).toBe("/proj");
  });
});
