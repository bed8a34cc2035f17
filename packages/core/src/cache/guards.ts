import { formatEntity, isEntity } from "../entity.js";
import { LayoutCacheError } from "../errors.js";

/** Best-effort label for a node key in error messages. */
export function describeNode(node: unknown): string {
  if (typeof node === "string") return JSON.stringify(node);
  if (typeof node === "number") return isEntity(node) ? formatEntity(node) : String(node);
  if (typeof node === "bigint" || typeof node === "boolean") return String(node);
  if (typeof node === "symbol") return node.toString();
  if (node === null || node === undefined) return String(node);
  const ctor = (node as { constructor?: { name?: unknown } }).constructor;
  return typeof ctor?.name === "string" && ctor.name.length > 0 ? `<${ctor.name}>` : "<object>";
}

export function throwUnregistered(accessor: string, node: unknown): never {
  throw new LayoutCacheError(
    "LAYOUT_CACHE_UNREGISTERED",
    `${accessor}: node ${describeNode(node)} is not registered`,
  );
}

export function assertLayer(layer: number): void {
  if (!Number.isSafeInteger(layer) || layer < 0) {
    throw new LayoutCacheError(
      "LAYOUT_CACHE_INVALID_LAYER",
      `setLayer: layer must be a non-negative safe integer (got ${String(layer)})`,
    );
  }
}

export function strictGet<TNode, V>(map: ReadonlyMap<TNode, V>, node: TNode, accessor: string): V {
  const value = map.get(node);
  if (value === undefined) throwUnregistered(accessor, node);
  return value;
}

export function strictSet<TNode, V>(map: Map<TNode, V>, node: TNode, value: V, accessor: string): void {
  if (!map.has(node)) throwUnregistered(accessor, node);
  map.set(node, value);
}
