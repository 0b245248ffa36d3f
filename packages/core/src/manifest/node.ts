const TEXT_KEY = "#text";
const ATTRIBUTE_PREFIX = "@_";

export const xmlParserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_name: string, _jpath: string, _isLeafNode: boolean, isAttribute: boolean) => !isAttribute,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toList = (value: unknown): unknown[] => (Array.isArray(value) ? value : [value]);

/**
 * Read-only view over one element of a parsed manifest.
 */
export class ManifestNode {
  constructor(
    readonly name: string,
    private readonly value: unknown,
  ) {}

  children(name: string): ManifestNode[] {
    if (!isRecord(this.value)) return [];
    const entry = this.value[name];
    if (entry === undefined) return [];
    return toList(entry).map((child) => new ManifestNode(name, child));
  }

  child(name: string): ManifestNode | null {
    return this.children(name)[0] ?? null;
  }

  /** First element at a slash-separated path below this one, e.g. `executables/xsltproc`. */
  find(elementPath: string): ManifestNode | null {
    return this.findAll(elementPath)[0] ?? null;
  }

  findAll(elementPath: string): ManifestNode[] {
    const segments = elementPath.split("/").filter((segment) => segment.length > 0);
    let current: ManifestNode[] = [this];
    for (const segment of segments) {
      current = current.flatMap((node) => node.children(segment));
    }
    return current;
  }

  text(): string | null {
    const { value } = this;
    if (typeof value === "string") return value.trim();
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    if (isRecord(value)) {
      const inner = value[TEXT_KEY];
      if (inner === undefined) return "";
      return typeof inner === "string" ? inner.trim() : String(inner);
    }
    return null;
  }

  childText(name: string): string | null {
    return this.child(name)?.text() ?? null;
  }

  attribute(name: string): string | null {
    if (!isRecord(this.value)) return null;
    const attr = this.value[`${ATTRIBUTE_PREFIX}${name}`];
    return typeof attr === "string" ? attr : null;
  }
}
