import { describe, test, expect } from "@jest/globals"
import {
  initAvl,
  insert,
  remove,
  select,
  clear,
  fromArray,
  ascending,
  descending,
  by,
  AvlTree,
  Less,
  Node,
} from "./index"
import fc from "fast-check"

const scenario = [5, 3, 8, 1, 4, 7, 9]

describe("insert", () => {
  test("returns the position each value takes in sorted order", () => {
    const tree = initAvl<number>(ascending)
    const ranks = scenario.map(x => insert(tree, x))
    expect(ranks).toEqual([0, 0, 2, 0, 2, 4, 6])
  })

  test("a single element is a leaf at rank 0", () => {
    const tree = initAvl<number>(ascending)
    expect(insert(tree, 42)).toBe(0)
    expect(select(tree, 0)).toBe(42)
    expect(tree.count).toBe(1)
    expect(tree.root?.height).toBe(1)
    expect(tree.root?.subtreeSize).toBe(0)
  })

  test("ascending input stays balanced", () => {
    const tree = fromArray(ascending, [1, 2, 3, 4, 5])
    expect(tree.root?.height).toBe(3)
    expect(tree.root?.value).toBe(2)
    assertInvariants(tree)
  })

  test("equal values are kept as distinct entries", () => {
    const tree = initAvl<number>(ascending)
    expect(insert(tree, 2)).toBe(0)
    expect(insert(tree, 2)).toBe(1)
    expect(insert(tree, 1)).toBe(0)
    expect(tree.count).toBe(3)
    assertEqualElements(tree, [1, 2, 2])
  })

  test("the returned rank selects the inserted value", () => {
    const arb = fc.array(fc.integer({ min: -1000, max: 1000 }), {
      maxLength: 200,
    })

    fc.assert(
      fc.property(arb, xs => {
        const tree = initAvl<number>(ascending)
        xs.forEach(x => {
          const rank = insert(tree, x)
          expect(select(tree, rank)).toBe(x)
        })
      }),
      { numRuns: 200 }
    )
  })

  test("height invariant is maintained", () => {
    const arb = fc.array(fc.integer(), { maxLength: 500 })

    fc.assert(
      fc.property(arb, xs => {
        const tree = fromArray(ascending, xs)
        assertInvariants(tree)

        // an AVL tree is at most ~1.44 times taller than a perfect one
        const height = tree.root ? tree.root.height : 0
        expect(height).toBeLessThanOrEqual(1.4405 * Math.log2(xs.length + 2))
      }),
      { numRuns: 200 }
    )
  })
})

describe("select", () => {
  test("finds elements by rank", () => {
    const tree = fromArray(ascending, scenario)
    expect(select(tree, 0)).toBe(1)
    expect(select(tree, 3)).toBe(5)
    expect(select(tree, 6)).toBe(9)
  })

  test("reproduces the sorted sequence", () => {
    const arb = fc.array(fc.integer(), { maxLength: 300 })

    fc.assert(
      fc.property(arb, xs => {
        const tree = fromArray(ascending, xs)
        assertEqualElements(
          tree,
          [...xs].sort((a, b) => a - b)
        )
      }),
      { numRuns: 200 }
    )
  })

  test("ranks out of bounds throw", () => {
    const tree = fromArray(ascending, scenario)
    expect(() => select(tree, 7)).toThrow(
      "Rank 7 is out of bounds for a tree of 7 elements"
    )
    expect(() => select(tree, -1)).toThrow(
      "Rank -1 is out of bounds for a tree of 7 elements"
    )
    expect(() => select(tree, 1.5)).toThrow(
      "Rank 1.5 is out of bounds for a tree of 7 elements"
    )
  })

  test("an empty tree has nothing to select", () => {
    const tree = initAvl<number>(ascending)
    expect(() => select(tree, 0)).toThrow(
      "Rank 0 is out of bounds for a tree of 0 elements"
    )
  })
})

describe("remove", () => {
  test("removing the root keeps the rest in order", () => {
    const tree = fromArray(ascending, scenario)
    expect(remove(tree, 5)).toEqual({ type: "removed", value: 5 })
    expect(tree.count).toBe(6)
    assertEqualElements(tree, [1, 3, 4, 7, 8, 9])
    assertInvariants(tree)
  })

  test("subtrees of equal height give up their minimum on the right", () => {
    const tree = fromArray(ascending, scenario)
    remove(tree, 5)
    expect(tree.root?.value).toBe(7)
  })

  test("a taller left subtree gives up its maximum", () => {
    const tree = fromArray(ascending, [5, 3, 8, 1])
    remove(tree, 5)
    expect(tree.root?.value).toBe(3)
    expect(tree.root?.left?.value).toBe(1)
    expect(tree.root?.right?.value).toBe(8)
    assertInvariants(tree)
  })

  test("a missing key leaves the tree unchanged", () => {
    const tree = fromArray(ascending, scenario)
    expect(remove(tree, 100)).toEqual({ type: "not-found" })
    expect(tree.count).toBe(7)
    assertEqualElements(tree, [1, 3, 4, 5, 7, 8, 9])
  })

  test("removing from an empty tree finds nothing", () => {
    const tree = initAvl<number>(ascending)
    expect(remove(tree, 1)).toEqual({ type: "not-found" })
    expect(tree.count).toBe(0)
    expect(tree.root).toBeNull()
  })

  test("removing the last element empties the tree", () => {
    const tree = fromArray(ascending, [1])
    expect(remove(tree, 1)).toEqual({ type: "removed", value: 1 })
    expect(tree.count).toBe(0)
    expect(tree.root).toBeNull()
  })

  test("removes one of several equal entries", () => {
    const tree = fromArray(ascending, [2, 2, 2])
    expect(remove(tree, 2)).toEqual({ type: "removed", value: 2 })
    expect(tree.count).toBe(2)
    assertEqualElements(tree, [2, 2])
    assertInvariants(tree)
  })

  test("invariants hold after every removal", () => {
    const arb = fc
      .uniqueArray(fc.integer(), { minLength: 1000, maxLength: 1000 })
      .chain(xs =>
        fc.tuple(
          fc.constant(xs),
          fc.shuffledSubarray(xs, { minLength: xs.length })
        )
      )

    fc.assert(
      fc.property(arb, ([xs, order]) => {
        const tree = fromArray(ascending, xs)
        order.forEach((x, i) => {
          expect(remove(tree, x)).toEqual({ type: "removed", value: x })
          expect(tree.count).toBe(xs.length - i - 1)
          assertInvariants(tree)
        })
        expect(tree.root).toBeNull()
      }),
      { numRuns: 3 }
    )
  })

  test("inserting then removing a value restores the sequence", () => {
    const arb = fc.tuple(
      fc.uniqueArray(fc.integer({ min: 0, max: 10_000 }), { maxLength: 200 }),
      fc.integer({ min: 10_001, max: 20_000 })
    )

    fc.assert(
      fc.property(arb, ([xs, x]) => {
        const tree = fromArray(ascending, xs)
        const before = toArray(tree)

        insert(tree, x)
        expect(remove(tree, x)).toEqual({ type: "removed", value: x })

        expect(tree.count).toBe(xs.length)
        expect(toArray(tree)).toEqual(before)
        assertInvariants(tree)
      }),
      { numRuns: 200 }
    )
  })
})

describe("clear", () => {
  test("releases every node once", () => {
    const tree = fromArray(ascending, scenario)
    expect(clear(tree)).toBe(7)
    expect(tree.count).toBe(0)
    expect(tree.root).toBeNull()
    expect(clear(tree)).toBe(0)
  })

  test("a cleared tree can be reused", () => {
    const tree = fromArray(ascending, scenario)
    clear(tree)
    expect(insert(tree, 10)).toBe(0)
    assertEqualElements(tree, [10])
  })
})

describe("comparators", () => {
  test("descending order reverses the ranks", () => {
    const tree = fromArray(descending, scenario)
    assertEqualElements(tree, [9, 8, 7, 5, 4, 3, 1])
  })

  test("strings order lexicographically", () => {
    const tree = fromArray(ascending, ["pear", "apple", "fig"])
    assertEqualElements(tree, ["apple", "fig", "pear"])
  })

  test("records are ordered and removed by key", () => {
    type Entry = { id: number; name: string }
    const tree = initAvl<Entry>(by((entry: Entry) => entry.id))

    expect(insert(tree, { id: 1, name: "a" })).toBe(0)
    expect(insert(tree, { id: 1, name: "b" })).toBe(1)
    expect(insert(tree, { id: 0, name: "c" })).toBe(0)

    expect(remove(tree, { id: 1, name: "x" })).toEqual({
      type: "removed",
      value: { id: 1, name: "a" },
    })
    expect(toArray(tree).map(entry => entry.name)).toEqual(["c", "b"])
    assertInvariants(tree)
  })
})

const toArray = <T>(tree: AvlTree<T>): T[] =>
  new Array(tree.count).fill(null).map((_, i) => select(tree, i))

const assertEqualElements = <T>(tree: AvlTree<T>, arr: Array<T>): void => {
  expect(tree.count).toBe(arr.length)
  arr.forEach((item, i) => {
    expect(select(tree, i)).toBe(item)
  })
}

const assertInvariants = <T>(tree: AvlTree<T>): void => {
  const values: T[] = []
  const violations: string[] = []
  const count = checkNode(tree.root, values, violations)
  expect(violations).toEqual([])
  expect(tree.count).toBe(count)
  assertInOrder(values, tree.less)
}

/**
 * Check heights, sizes and balance below `node`, collecting values in order.
 * Returns the number of nodes visited.
 */
const checkNode = <T>(
  node: Node<T> | null,
  values: T[],
  violations: string[]
): number => {
  if (!node) return 0

  const left = checkNode(node.left, values, violations)
  const position = values.push(node.value) - 1
  const right = checkNode(node.right, values, violations)

  const leftHeight = node.left ? node.left.height : 0
  const rightHeight = node.right ? node.right.height : 0
  if (node.height !== 1 + Math.max(leftHeight, rightHeight))
    violations.push(`height of node ${position}`)
  if (Math.abs(rightHeight - leftHeight) > 1)
    violations.push(`balance of node ${position}`)
  if (node.subtreeSize !== left + right)
    violations.push(`subtree size of node ${position}`)

  return left + right + 1
}

const assertInOrder = <T>(values: T[], less: Less<T>): void => {
  const outOfOrder = values
    .slice(1)
    .filter((value, i) => less(value, values[i]))
  expect(outOfOrder).toEqual([])
}
