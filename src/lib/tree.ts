import { ListExtractionError } from "./errors";

export type ArrayNode = { kind: "array"; items: readonly TreeNode[] };
export type ObjectNode = { kind: "object"; entries: ReadonlyMap<string, TreeNode> };
export type StringNode = { kind: "string"; value: string };
export type NumberNode = { kind: "number"; value: number };
export type BoolNode = { kind: "bool"; value: boolean };
export type NullNode = { kind: "null" };

/** Parsed-but-unschematized JSON value. */
export type TreeNode = ArrayNode | ObjectNode | StringNode | NumberNode | BoolNode | NullNode;

// Real payloads stay well under 20 levels.
export const DEFAULT_MAX_DEPTH = 512;

export type DepthOptions = {
  maxDepth?: number;
};

const NULL_NODE: NullNode = { kind: "null" };

export function tooDeep(maxDepth: number): ListExtractionError {
  return new ListExtractionError(
    "StructureTooDeep",
    `Initialization payload is nested deeper than ${maxDepth} levels.`
  );
}

/**
 * Convert a `JSON.parse` result into a tree node.
 * Values JSON cannot produce (undefined, functions, bigint, symbols) become null.
 */
export function toTreeNode(value: unknown, options: DepthOptions = {}): TreeNode {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const convert = (v: unknown, depth: number): TreeNode => {
    if (depth > maxDepth) throw tooDeep(maxDepth);

    if (v === null) return NULL_NODE;
    if (Array.isArray(v)) {
      return { kind: "array", items: v.map((item: unknown) => convert(item, depth + 1)) };
    }

    switch (typeof v) {
      case "string":
        return { kind: "string", value: v };
      case "number":
        return { kind: "number", value: v };
      case "boolean":
        return { kind: "bool", value: v };
      case "object": {
        const entries = new Map<string, TreeNode>();
        for (const [k, child] of Object.entries(v)) {
          entries.set(k, convert(child, depth + 1));
        }
        return { kind: "object", entries };
      }
      default:
        return NULL_NODE;
    }
  };

  return convert(value, 0);
}

/**
 * Parse JSON text into a tree.
 * Throws `PayloadParseFailed` for invalid JSON and `StructureTooDeep` past the depth bound.
 */
export function parseTree(text: string, options: DepthOptions = {}): TreeNode {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ListExtractionError(
      "PayloadParseFailed",
      `Initialization payload is not valid JSON: ${reason}`,
      { cause: err }
    );
  }
  return toTreeNode(raw, options);
}

// --- try-get accessors: out of range or wrong kind yields undefined ---

export function itemAt(node: ArrayNode, index: number): TreeNode | undefined {
  return index >= 0 && index < node.items.length ? node.items[index] : undefined;
}

export function arrayAt(node: ArrayNode, index: number): ArrayNode | undefined {
  const item = itemAt(node, index);
  return item?.kind === "array" ? item : undefined;
}

export function stringAt(node: ArrayNode, index: number): string | undefined {
  const item = itemAt(node, index);
  return item?.kind === "string" ? item.value : undefined;
}

export function numberAt(node: ArrayNode, index: number): number | undefined {
  const item = itemAt(node, index);
  return item?.kind === "number" && Number.isFinite(item.value) ? item.value : undefined;
}

/** Children in traversal order: array items, then object values. */
export function childrenOf(node: TreeNode): readonly TreeNode[] {
  switch (node.kind) {
    case "array":
      return node.items;
    case "object":
      return [...node.entries.values()];
    case "string":
    case "number":
    case "bool":
    case "null":
      return [];
  }
}
