import { assert, describe, test } from "@cellbox/testkit";
import { makeEntity } from "../../entity.js";
import { GeometryChange, geometryChangeNames } from "../../layout/geometryChanged.js";
import type { LayoutCache, LayoutCacheStore } from "../contract.js";
import { createMapNodeCache } from "../mapNodeCache.js";
import { createNodeCache } from "../nodeCache.js";

type TreeNode<TNode> = Readonly<{
  id: TNode;
  width: number;
  height: number;
  children: readonly TreeNode<TNode>[];
}>;

/*
 * Minimal column-stacking solver written only against LayoutCache, so the
 * same traversal runs on either storage implementation.
 */

function measure<TNode>(cache: LayoutCache<TNode>, node: TreeNode<TNode>): void {
  let widthMax = 0;
  let heightSum = 0;
  const last = node.children.length - 1;
  for (let i = 0; i <= last; i++) {
    const child = node.children[i];
    if (!child) continue;
    measure(cache, child);
    cache.setStackFirstChild(child.id, i === 0);
    cache.setStackLastChild(child.id, i === last);
    widthMax = Math.max(widthMax, cache.newWidth(child.id));
    heightSum += cache.newHeight(child.id);
  }
  cache.setChildWidthMax(node.id, widthMax);
  cache.setChildHeightSum(node.id, heightSum);
  cache.setNewWidth(node.id, Math.max(node.width, widthMax));
  cache.setNewHeight(node.id, Math.max(node.height, heightSum));
}

function place<TNode>(cache: LayoutCache<TNode>, node: TreeNode<TNode>, x: number, y: number): void {
  const next = [
    [GeometryChange.POSX, cache.posx(node.id), x, cache.setPosx],
    [GeometryChange.POSY, cache.posy(node.id), y, cache.setPosy],
    [GeometryChange.WIDTH, cache.width(node.id), cache.newWidth(node.id), cache.setWidth],
    [GeometryChange.HEIGHT, cache.height(node.id), cache.newHeight(node.id), cache.setHeight],
  ] as const;
  for (const [flag, current, value, write] of next) {
    if (current === value) continue;
    write(node.id, value);
    cache.setGeometryChanged(node.id, flag, true);
  }

  let cursor = y;
  for (const child of node.children) {
    place(cache, child, x, cursor);
    cursor += cache.height(child.id);
  }
}

function registerTree<TNode>(cache: LayoutCache<TNode>, node: TreeNode<TNode>): void {
  cache.register(node.id);
  for (const child of node.children) registerTree(cache, child);
}

function tree<TNode>(ids: readonly [TNode, TNode, TNode], lastHeight: number): TreeNode<TNode> {
  const [root, a, b] = ids;
  return {
    id: root,
    width: 10,
    height: 0,
    children: [
      { id: a, width: 30, height: 5, children: [] },
      { id: b, width: 20, height: lastHeight, children: [] },
    ],
  };
}

function runSolverScenario<TNode>(
  label: string,
  cache: LayoutCacheStore<TNode>,
  ids: readonly [TNode, TNode, TNode],
): void {
  const [root, a, b] = ids;

  describe(`column solver over ${label}`, () => {
    test("first pass publishes rects, aggregates and change flags", () => {
      const first = tree(ids, 7);
      registerTree(cache, first);
      measure(cache, first);
      place(cache, first, 0, 0);

      assert.deepEqual(cache.rect(root), { posx: 0, posy: 0, width: 30, height: 12 });
      assert.deepEqual(cache.rect(a), { posx: 0, posy: 0, width: 30, height: 5 });
      assert.deepEqual(cache.rect(b), { posx: 0, posy: 5, width: 20, height: 7 });
      assert.equal(cache.childWidthMax(root), 30);
      assert.equal(cache.childHeightSum(root), 12);
      assert.equal(cache.stackFirstChild(a), true);
      assert.equal(cache.stackLastChild(a), false);
      assert.equal(cache.stackLastChild(b), true);

      assert.deepEqual(geometryChangeNames(cache.geometryChanged(root)), ["WIDTH", "HEIGHT"]);
      assert.deepEqual(geometryChangeNames(cache.geometryChanged(a)), ["WIDTH", "HEIGHT"]);
      assert.deepEqual(geometryChangeNames(cache.geometryChanged(b)), ["POSY", "WIDTH", "HEIGHT"]);
    });

    test("an unchanged second pass leaves every flag clear", () => {
      for (const node of cache.nodes()) cache.clearGeometryChanged(node);
      const second = tree(ids, 7);
      measure(cache, second);
      place(cache, second, 0, 0);
      assert.deepEqual([...cache.nodesWithGeometryChanges()], []);
    });

    test("growing one child flags only what moved", () => {
      for (const node of cache.nodes()) cache.clearGeometryChanged(node);
      const third = tree(ids, 9);
      measure(cache, third);
      place(cache, third, 0, 0);

      assert.deepEqual(new Set(cache.nodesWithGeometryChanges()), new Set([root, b]));
      assert.deepEqual(geometryChangeNames(cache.geometryChanged(root)), ["HEIGHT"]);
      assert.deepEqual(geometryChangeNames(cache.geometryChanged(b)), ["HEIGHT"]);
      assert.equal(cache.height(root), 14);
    });
  });
}

runSolverScenario("createNodeCache", createNodeCache({ warnOnStaleHandle: false }), [
  makeEntity(0),
  makeEntity(1),
  makeEntity(2),
]);

runSolverScenario("createMapNodeCache", createMapNodeCache<string>(), ["root", "a", "b"]);
