import { SIGNATURE } from "./payload-layout";
import { DEFAULT_MAX_DEPTH, arrayAt, childrenOf, stringAt, tooDeep } from "./tree";
import type { ArrayNode, DepthOptions, TreeNode } from "./tree";

/** Share URL carried by an array that has the list signature, if it has one. */
export function signatureUrl(node: ArrayNode): string | undefined {
  const holder = arrayAt(node, SIGNATURE.holderOffset);
  if (!holder) return undefined;

  const url = stringAt(holder, SIGNATURE.urlOffset);
  if (url === undefined || !url.includes(SIGNATURE.urlMarker)) return undefined;
  return url;
}

/**
 * Depth-first, left-to-right search for the first array carrying the list signature.
 * Each array is checked before its children are visited.
 */
export function findSignatureMatch(root: TreeNode, options: DepthOptions = {}): ArrayNode | null {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const visit = (node: TreeNode, depth: number): ArrayNode | null => {
    if (depth > maxDepth) throw tooDeep(maxDepth);

    if (node.kind === "array" && signatureUrl(node) !== undefined) return node;

    for (const child of childrenOf(node)) {
      const hit = visit(child, depth + 1);
      if (hit) return hit;
    }
    return null;
  };

  return visit(root, 0);
}
