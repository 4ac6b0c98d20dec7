/**
 * Error taxonomy for topology loading, model construction and derivation.
 *
 * Every error is fatal for the run that raised it. The optional node/edge
 * context is carried so the CLI can point at the offending element.
 */

export type TopologyErrorCode =
  | "MalformedDocument"
  | "InvalidNodeId"
  | "DanglingEdgeReference"
  | "UnknownNode"
  | "InvalidDelay";

export interface TopologyErrorContext {
  nodeId?: string;
  edgeId?: string;
}

export class TopologyError extends Error {
  readonly code: TopologyErrorCode;
  readonly nodeId?: string;
  readonly edgeId?: string;

  constructor(code: TopologyErrorCode, message: string, context: TopologyErrorContext = {}) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
    this.nodeId = context.nodeId;
    this.edgeId = context.edgeId;
  }
}

export class MalformedDocumentError extends TopologyError {
  constructor(message: string) {
    super("MalformedDocument", `Malformed GraphML document: ${message}`);
  }
}

export class InvalidNodeIdError extends TopologyError {
  constructor(nodeId: string) {
    super("InvalidNodeId", `Node id '${nodeId}' is not an integer`, { nodeId });
  }
}

export class DanglingEdgeReferenceError extends TopologyError {
  constructor(edgeId: string, nodeId: string, end: "source" | "target") {
    super(
      "DanglingEdgeReference",
      `Edge '${edgeId}' references unknown ${end} node '${nodeId}'`,
      { edgeId, nodeId }
    );
  }
}

export class UnknownNodeError extends TopologyError {
  constructor(nodeId: string, detail?: string) {
    super("UnknownNode", detail ?? `Unknown node '${nodeId}'`, { nodeId });
  }
}

export class InvalidDelayError extends TopologyError {
  readonly value: string;

  constructor(value: string, context: TopologyErrorContext = {}) {
    super("InvalidDelay", `Invalid delay '${value}'`, context);
    this.value = value;
  }
}

/** Raised when the netgen configuration file has the wrong shape. */
export class ConfigError extends Error {
  readonly path: string;
  readonly detail: string;

  constructor(path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.name = "ConfigError";
    this.path = path;
    this.detail = detail;
  }
}

/** Raised when the Graphviz layout engine is missing or exits non-zero. */
export class RenderError extends Error {
  readonly stderr: string;

  constructor(message: string, stderr = "") {
    super(message);
    this.name = "RenderError";
    this.stderr = stderr;
  }
}

export function isTopologyError(err: unknown): err is TopologyError {
  return err instanceof TopologyError;
}
