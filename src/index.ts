import type { Less } from "./utils/compare"

export type { Less } from "./utils/compare"
export { ascending, descending, by } from "./utils/compare"

export type AvlTree<T> = {
  count: number
  root: Node<T> | null
  readonly less: Less<T>
}

export type Node<T> = {
  value: T
  height: number // >= 1
  subtreeSize: number // descendants, excluding the node itself
  left: Node<T> | null
  right: Node<T> | null
}

export type Removal<T> = { type: "removed"; value: T } | { type: "not-found" }

type Placed<T> = { node: Node<T>; rank: number }
type Pruned<T> = { node: Node<T> | null; removal: Removal<T> }
type Extracted<T> = { rest: Node<T> | null; value: T }

const NOT_FOUND = { type: "not-found" } as const

const Leaf = <T>(value: T): Node<T> => ({
  value,
  height: 1,
  subtreeSize: 0,
  left: null,
  right: null,
})

function assert(
  predicate: boolean,
  message = "Assertion failed"
): asserts predicate {
  if (!predicate) throw Error(message)
}

export const initAvl = <T>(less: Less<T>): AvlTree<T> => ({
  count: 0,
  root: null,
  less,
})

export const fromArray = <T>(less: Less<T>, values: T[]): AvlTree<T> => {
  const tree = initAvl(less)
  values.forEach(value => insert(tree, value))
  return tree
}

/**
 * Insert `x` into `tree` and return its position in sorted order.
 *
 * Values that compare equal to an existing element are kept as separate
 * entries, placed after the ones already present.
 */
export const insert = <T>(tree: AvlTree<T>, x: T): number => {
  const placed = insertNode(tree.root, x, tree.less, 0)
  tree.root = placed.node
  tree.count += 1
  return placed.rank
}

const insertNode = <T>(
  node: Node<T> | null,
  x: T,
  less: Less<T>,
  skipped: number
): Placed<T> => {
  if (!node) return { node: Leaf(x), rank: skipped }

  if (less(x, node.value)) {
    const placed = insertNode(node.left, x, less, skipped)
    node.left = placed.node
    return { node: restoreBalance(node), rank: placed.rank }
  } else {
    // this node and everything to its left come before `x`
    const placed = insertNode(
      node.right,
      x,
      less,
      skipped + countOf(node.left) + 1
    )
    node.right = placed.node
    return { node: restoreBalance(node), rank: placed.rank }
  }
}

/**
 * Remove the element that compares equal to `key`.
 */
export const remove = <T>(tree: AvlTree<T>, key: T): Removal<T> => {
  const pruned = removeNode(tree.root, key, tree.less)
  tree.root = pruned.node
  if (pruned.removal.type === "removed") tree.count -= 1
  return pruned.removal
}

const removeNode = <T>(
  node: Node<T> | null,
  key: T,
  less: Less<T>
): Pruned<T> => {
  if (!node) return { node: null, removal: NOT_FOUND }

  if (less(node.value, key)) {
    const pruned = removeNode(node.right, key, less)
    node.right = pruned.node
    return { node: restoreBalance(node), removal: pruned.removal }
  }

  if (less(key, node.value)) {
    const pruned = removeNode(node.left, key, less)
    node.left = pruned.node
    return { node: restoreBalance(node), removal: pruned.removal }
  }

  const removal: Removal<T> = { type: "removed", value: node.value }

  if (!node.left && !node.right) {
    unlink(node)
    return { node: null, removal }
  }

  // the replacement comes from the taller subtree
  if (heightOf(node.right) >= heightOf(node.left)) {
    assert(node.right !== null)
    const extracted = extractMin(node.right)
    node.right = extracted.rest
    node.value = extracted.value
  } else {
    assert(node.left !== null)
    const extracted = extractMax(node.left)
    node.left = extracted.rest
    node.value = extracted.value
  }

  return { node: restoreBalance(node), removal }
}

const extractMin = <T>(node: Node<T>): Extracted<T> => {
  if (!node.left) {
    const extracted = { rest: node.right, value: node.value }
    unlink(node)
    return extracted
  }

  const extracted = extractMin(node.left)
  node.left = extracted.rest
  return { rest: restoreBalance(node), value: extracted.value }
}

const extractMax = <T>(node: Node<T>): Extracted<T> => {
  if (!node.right) {
    const extracted = { rest: node.left, value: node.value }
    unlink(node)
    return extracted
  }

  const extracted = extractMax(node.right)
  node.right = extracted.rest
  return { rest: restoreBalance(node), value: extracted.value }
}

/**
 * Find the element at position `rank` in sorted order. Callers must check
 * `rank` against `tree.count` first: an out of range rank throws.
 */
export const select = <T>(tree: AvlTree<T>, rank: number): T => {
  assert(
    Number.isInteger(rank) && rank >= 0 && rank < tree.count,
    `Rank ${rank} is out of bounds for a tree of ${tree.count} elements`
  )
  return selectNode(tree.root, rank, 0)
}

const selectNode = <T>(
  node: Node<T> | null,
  rank: number,
  skipped: number
): T => {
  assert(node !== null)
  const position = skipped + countOf(node.left)
  if (position === rank) return node.value
  return position < rank
    ? selectNode(node.right, rank, position + 1)
    : selectNode(node.left, rank, skipped)
}

/**
 * Release every node, children before their parent. Returns the number of
 * nodes released.
 */
export const clear = <T>(tree: AvlTree<T>): number => {
  const released = releaseNode(tree.root)
  tree.root = null
  tree.count = 0
  return released
}

const releaseNode = <T>(node: Node<T> | null): number => {
  if (!node) return 0
  const released = releaseNode(node.left) + releaseNode(node.right)
  unlink(node)
  return released + 1
}

const unlink = <T>(node: Node<T>): void => {
  node.left = null
  node.right = null
}

/**
 * Restore the height invariant at `node` after one of its subtrees changed
 * height by at most one. Returns the new root of the subtree.
 */
const restoreBalance = <T>(node: Node<T>): Node<T> => {
  updateHeight(node)
  const balance = balanceOf(node)

  if (balance === 2) {
    assert(node.right !== null)
    if (balanceOf(node.right) < 0) node.right = rotateRight(node.right)
    return rotateLeft(node)
  }

  if (balance === -2) {
    assert(node.left !== null)
    if (balanceOf(node.left) > 0) node.left = rotateLeft(node.left)
    return rotateRight(node)
  }

  // the children may have been replaced without a change in height
  updateSize(node)
  return node
}

const rotateRight = <T>(node: Node<T>): Node<T> => {
  const left = node.left
  assert(left !== null)
  node.left = left.right
  left.right = node
  // `node` is now below `left`, so it must be updated first
  updateHeight(node)
  updateHeight(left)
  updateSize(node)
  updateSize(left)
  return left
}

const rotateLeft = <T>(node: Node<T>): Node<T> => {
  const right = node.right
  assert(right !== null)
  node.right = right.left
  right.left = node
  updateHeight(node)
  updateHeight(right)
  updateSize(node)
  updateSize(right)
  return right
}

const updateHeight = <T>(node: Node<T>): void => {
  node.height = 1 + Math.max(heightOf(node.left), heightOf(node.right))
}

const updateSize = <T>(node: Node<T>): void => {
  node.subtreeSize = countOf(node.left) + countOf(node.right)
}

const balanceOf = <T>(node: Node<T>): number =>
  heightOf(node.right) - heightOf(node.left)

const heightOf = <T>(node: Node<T> | null): number => (node ? node.height : 0)

/**
 * Number of elements in the subtree rooted at `node`, including itself.
 */
const countOf = <T>(node: Node<T> | null): number =>
  node ? node.subtreeSize + 1 : 0
