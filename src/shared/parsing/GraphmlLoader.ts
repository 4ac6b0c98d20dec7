/**
 * GraphML loader - turns a GraphML document into raw node and edge maps.
 * Pure function - no file system access.
 *
 * The document is read in three passes over the DOM:
 *   1. `<key>` elements build the key schema (key id -> attribute name)
 *   2. `<node>` elements, with their `<data>` children resolved through the schema
 *   3. `<edge>` elements, same resolution, kept in document order
 */

import { DOMParser } from "@xmldom/xmldom";
import { SaxesParser } from "saxes";

import { MalformedDocumentError } from "../errors";
import type {
  AttributeMap,
  KeyDefinition,
  RawEdge,
  RawNodeAttributes,
  RawTopology
} from "../types/topology";

import type { LoadOptions, ParserLogger } from "./types";
import { GRAPHML_NS, nullLogger } from "./types";

const ELEMENT_NODE = 1;

// ============================================================================
// DOM helpers
// ============================================================================

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** GraphML elements may live in the GraphML namespace or in none at all. */
function isGraphmlElement(el: Element, localName: string): boolean {
  const name = el.localName ?? el.nodeName;
  if (name !== localName) return false;
  return !el.namespaceURI || el.namespaceURI === GRAPHML_NS;
}

function childElements(parent: Element, localName: string): Element[] {
  const result: Element[] = [];
  const children = parent.childNodes;
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (isElement(child) && isGraphmlElement(child, localName)) {
      result.push(child);
    }
  }
  return result;
}

function descendantElements(root: Element, localName: string): Element[] {
  const result: Element[] = [];
  const visit = (el: Element): void => {
    const children = el.childNodes;
    for (let i = 0; i < children.length; i++) {
      const child = children[i];
      if (!isElement(child)) continue;
      if (isGraphmlElement(child, localName)) result.push(child);
      visit(child);
    }
  };
  visit(root);
  return result;
}

function attr(el: Element, name: string): string | undefined {
  if (!el.hasAttribute(name)) return undefined;
  return el.getAttribute(name) ?? undefined;
}

// ============================================================================
// Document parsing
// ============================================================================

function decode(document: string | Uint8Array): string {
  const text = typeof document === "string" ? document : new TextDecoder("utf-8").decode(document);
  return text.replace(/^\uFEFF/, "");
}

/**
 * Strict well-formedness pass. xmldom recovers from stray `&` and from
 * content after the root element; saxes does not.
 */
function assertWellFormed(text: string): void {
  const sax = new SaxesParser({ xmlns: true });
  try {
    sax.write(text).close();
  } catch (err) {
    throw new MalformedDocumentError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parses the XML text, collecting xmldom errors instead of letting the parser
 * recover from them.
 */
function parseXml(text: string, log: ParserLogger): Element {
  assertWellFormed(text);
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: unknown) => log.warn(`GraphML: ${String(msg)}`),
      error: (msg: unknown) => {
        errors.push(String(msg));
      },
      fatalError: (msg: unknown) => {
        errors.push(String(msg));
      }
    }
  });

  let doc: Document | undefined;
  try {
    doc = parser.parseFromString(text, "text/xml");
  } catch (err) {
    throw new MalformedDocumentError(err instanceof Error ? err.message : String(err));
  }

  if (errors.length > 0) {
    throw new MalformedDocumentError(errors[0]);
  }
  const root = doc?.documentElement;
  if (!root) {
    throw new MalformedDocumentError("document has no root element");
  }
  if (!isGraphmlElement(root, "graphml")) {
    throw new MalformedDocumentError(`root element is <${root.nodeName}>, expected <graphml>`);
  }
  return root;
}

/**
 * Builds the key schema from every `<key>` element in the document.
 */
export function collectKeySchema(root: Element): Map<string, KeyDefinition> {
  const keys = new Map<string, KeyDefinition>();
  for (const keyEl of descendantElements(root, "key")) {
    const id = attr(keyEl, "id");
    if (id === undefined) continue;
    keys.set(id, {
      id,
      for: attr(keyEl, "for") ?? "all",
      name: attr(keyEl, "attr.name") ?? id,
      type: attr(keyEl, "attr.type")
    });
  }
  return keys;
}

/**
 * Resolves the `<data>` children of a node or edge element.
 * A reference to an undeclared key is dropped, not reported as an error.
 */
function resolveData(
  el: Element,
  keys: Map<string, KeyDefinition>,
  owner: string,
  log: ParserLogger
): AttributeMap {
  const attributes = new Map<string, string>();
  for (const dataEl of childElements(el, "data")) {
    const keyId = attr(dataEl, "key") ?? "";
    const def = keys.get(keyId);
    if (!def) {
      log.debug(`Ignoring data with undeclared key '${keyId}' on ${owner}`);
      continue;
    }
    attributes.set(def.name, dataEl.textContent ?? "");
  }
  // own properties, so names like `__proto__` survive
  return Object.fromEntries(attributes);
}

function collectNodes(
  root: Element,
  keys: Map<string, KeyDefinition>,
  log: ParserLogger
): Map<string, RawNodeAttributes> {
  const nodes = new Map<string, RawNodeAttributes>();
  for (const nodeEl of descendantElements(root, "node")) {
    const id = attr(nodeEl, "id") ?? "";
    const data = resolveData(nodeEl, keys, `node '${id}'`, log);
    if (nodes.has(id)) {
      log.warn(`Duplicate node id '${id}', later declaration wins`);
    }
    nodes.set(id, { ...data, id });
  }
  return nodes;
}

function collectEdges(root: Element, keys: Map<string, KeyDefinition>, log: ParserLogger): RawEdge[] {
  return descendantElements(root, "edge").map((edgeEl, position) => {
    const id = attr(edgeEl, "id") ?? `e${position}`;
    return {
      id,
      source: attr(edgeEl, "source") ?? "",
      target: attr(edgeEl, "target") ?? "",
      attributes: resolveData(edgeEl, keys, `edge '${id}'`, log)
    };
  });
}

/**
 * Loads a GraphML document into raw node and edge maps.
 *
 * @throws MalformedDocumentError if the document is not well-formed GraphML
 */
export function loadTopology(document: string | Uint8Array, options: LoadOptions = {}): RawTopology {
  const log = options.logger ?? nullLogger;
  const root = parseXml(decode(document), log);

  const keys = collectKeySchema(root);
  const nodes = collectNodes(root, keys, log);
  const edges = collectEdges(root, keys, log);

  log.debug(`Loaded GraphML: ${keys.size} keys, ${nodes.size} nodes, ${edges.length} edges`);
  return { nodes, edges, keys };
}
