import { XMLParser } from "fast-xml-parser";
import type { ElementNode, IndexedElement, Rect } from "../types.js";

const TYPE_PREFIX = "XCUIElementType";

export class SourceParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SourceParseError";
  }
}

type Attributes = Record<string, unknown>;

function isRecord(value: unknown): value is Attributes {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stripTypePrefix(type: string): string {
  return type.startsWith(TYPE_PREFIX) ? type.slice(TYPE_PREFIX.length) : type;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "number") return String(value);
  if (typeof value !== "string" || value === "") return undefined;
  return value;
}

function flag(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const lowered = value.toLowerCase();
    if (lowered === "1" || lowered === "true") return true;
    if (lowered === "0" || lowered === "false") return false;
  }
  return fallback;
}

function coordinate(value: unknown): number {
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function rectFrom(source: Attributes): Rect {
  return {
    x: coordinate(source.x),
    y: coordinate(source.y),
    width: coordinate(source.width),
    height: coordinate(source.height),
  };
}

// ---------------------------------------------------------------------------
// JSON source
// ---------------------------------------------------------------------------

/**
 * Converts the agent's JSON source (`/source?format=json`) into an element
 * tree. The agent reports `isEnabled`/`isVisible` as "1"/"0" on some versions
 * and as booleans on others.
 */
export function parseJsonSource(value: unknown): ElementNode {
  if (!isRecord(value)) {
    throw new SourceParseError("JSON source root is not an object");
  }
  return jsonNode(value);
}

function jsonNode(raw: Attributes): ElementNode {
  const type = optionalString(raw.type) ?? "Other";
  const rect = isRecord(raw.rect) ? rectFrom(raw.rect) : rectFrom(raw);
  const children = Array.isArray(raw.children) ? raw.children.filter(isRecord).map(jsonNode) : [];

  return {
    type: stripTypePrefix(type),
    label: optionalString(raw.label),
    value: optionalString(raw.value),
    identifier: optionalString(raw.rawIdentifier) ?? optionalString(raw.identifier),
    text: optionalString(raw.name),
    enabled: flag(raw.isEnabled ?? raw.enabled, true),
    visible: flag(raw.isVisible ?? raw.visible, true),
    frame: rect,
    children,
  };
}

// ---------------------------------------------------------------------------
// XML source
// ---------------------------------------------------------------------------

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  parseTagValue: false,
});

const ATTRIBUTES_KEY = ":@";

function tagOf(node: Attributes): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

function isElementTag(tag: string | undefined): tag is string {
  return tag !== undefined && !tag.startsWith("?") && !tag.startsWith("#");
}

// The agent wraps the application element in <AppiumAUT>.
const WRAPPER_TAG = "AppiumAUT";

function elementChildren(node: Attributes, tag: string): Attributes[] {
  const body = node[tag];
  return Array.isArray(body) ? body.filter(isRecord).filter((child) => isElementTag(tagOf(child))) : [];
}

/**
 * Converts the agent's XML source into the same element tree as the JSON
 * form. Sibling order is kept, which is why the parser runs with
 * `preserveOrder`.
 */
export function parseXmlSource(xml: string): ElementNode {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml);
  } catch (error) {
    throw new SourceParseError(
      `XML source could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const nodes = Array.isArray(parsed) ? parsed.filter(isRecord) : [];
  let root = nodes.find((node) => isElementTag(tagOf(node)));
  while (root && tagOf(root) === WRAPPER_TAG) {
    root = elementChildren(root, WRAPPER_TAG)[0];
  }
  if (!root) {
    throw new SourceParseError("XML source has no root element");
  }
  return xmlNode(root);
}

function xmlNode(raw: Attributes): ElementNode {
  const tag = tagOf(raw) ?? "Other";
  const rawAttributes = raw[ATTRIBUTES_KEY];
  const attributes: Attributes = isRecord(rawAttributes) ? rawAttributes : {};
  const children = elementChildren(raw, tag).map(xmlNode);

  return {
    type: stripTypePrefix(optionalString(attributes.type) ?? tag),
    label: optionalString(attributes.label),
    value: optionalString(attributes.value),
    identifier: optionalString(attributes.identifier),
    text: optionalString(attributes.name),
    enabled: flag(attributes.enabled, true),
    visible: flag(attributes.visible, true),
    frame: rectFrom(attributes),
    children,
  };
}

// ---------------------------------------------------------------------------
// Indexing and rendering
// ---------------------------------------------------------------------------

function toIndexed(node: ElementNode, index: number, depth: number): IndexedElement {
  const { children, ...fields } = node;
  return {
    ...fields,
    index,
    depth,
    center: {
      x: Math.round(node.frame.x + node.frame.width / 2),
      y: Math.round(node.frame.y + node.frame.height / 2),
    },
    childCount: children.length,
  };
}

/**
 * Flattens the tree in pre-order (parent first, children in document order)
 * and numbers the elements from 0.
 */
export function indexTree(root: ElementNode): IndexedElement[] {
  const elements: IndexedElement[] = [];
  const visit = (node: ElementNode, depth: number): void => {
    elements.push(toIndexed(node, elements.length, depth));
    for (const child of node.children) {
      visit(child, depth + 1);
    }
  };
  visit(root, 0);
  return elements;
}

/** Most specific name available: identifier, then label, value, text. */
export function displayName(element: Pick<IndexedElement, "identifier" | "label" | "value" | "text">): string | undefined {
  return element.identifier ?? element.label ?? element.value ?? element.text;
}

export function renderTree(elements: IndexedElement[]): string {
  return elements
    .map((element) => {
      const name = displayName(element);
      const suffix = name === undefined ? "" : ` "${name}"`;
      return `${"  ".repeat(element.depth)}[${element.index}] ${element.type}${suffix}`;
    })
    .join("\n");
}

const INTERACTIVE_TYPES = new Set([
  "Button",
  "Cell",
  "Link",
  "SearchField",
  "SecureTextField",
  "Slider",
  "Switch",
  "Tab",
  "TextField",
  "TextView",
  "Key",
]);

/**
 * Keeps named or interactive elements to cut noise from large trees.
 * Indices are untouched so they still refer to the full snapshot.
 */
export function filterInteresting(elements: IndexedElement[]): IndexedElement[] {
  return elements.filter(
    (element) => displayName(element) !== undefined || INTERACTIVE_TYPES.has(element.type),
  );
}
