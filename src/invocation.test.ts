import { describe, expect, it } from "vitest";

import { invokeContractFunction, scvI128, scvU32, uploadWasmFunction } from "./builders";
import { LimitExceededError, MalformedInputError, ValidationError } from "./errors";
import {
  InvocationBuilder,
  countInvocations,
  invocationFromFunction,
  validateInvocation,
  walkInvocations,
} from "./invocation";
import type { AuthorizedInvocation } from "./xdr/types";

const swap = Buffer.alloc(32, 1);
const tokenA = Buffer.alloc(32, 2);
const tokenB = Buffer.alloc(32, 3);

function leaf(contractId: Buffer, functionName: string): AuthorizedInvocation {
  return { contractId, functionName, args: [], subInvocations: [] };
}

describe("InvocationBuilder", () => {
  it("builds nested trees", () => {
    const root = new InvocationBuilder(swap, "swap", [scvU32(1)]);
    const first = root.addSubInvocation(tokenA, "increase_allowance", [scvI128(100n)]);
    first.addSubInvocation(tokenB, "transfer");
    root.addSubInvocation(tokenB, "increase_allowance");

    const tree = root.build();
    expect(tree.functionName).toBe("swap");
    expect(tree.args).toEqual([scvU32(1)]);
    expect(tree.subInvocations.map((s) => s.functionName)).toEqual([
      "increase_allowance",
      "increase_allowance",
    ]);
    expect(tree.subInvocations[0].subInvocations[0].contractId).toEqual(tokenB);
  });

  it("freezes the built tree", () => {
    const tree = new InvocationBuilder(swap, "swap").build();
    expect(Object.isFrozen(tree)).toBe(true);
    expect(Object.isFrozen(tree.subInvocations)).toBe(true);
    expect(Object.isFrozen(tree.args)).toBe(true);
  });

  it("does not alias the caller's contract ID", () => {
    const id = Buffer.alloc(32, 5);
    const tree = new InvocationBuilder(id, "run").build();
    id[0] = 0;
    expect(tree.contractId[0]).toBe(5);
  });

  it("rejects additions after build", () => {
    const root = new InvocationBuilder(swap, "swap");
    const child = root.addSubInvocation(tokenA, "transfer");
    root.build();
    expect(() => root.addSubInvocation(tokenB, "transfer")).toThrow(ValidationError);
    expect(() => child.addSubInvocation(tokenB, "transfer")).toThrow(ValidationError);
  });

  it("copies attached subtrees", () => {
    const subtree = new InvocationBuilder(tokenA, "transfer").build();
    const root = new InvocationBuilder(swap, "swap");
    root.addSubtree(subtree);
    root.addSubtree(subtree);
    const tree = root.build();

    expect(tree.subInvocations).toHaveLength(2);
    expect(tree.subInvocations[0]).not.toBe(tree.subInvocations[1]);
    expect(() => validateInvocation(tree)).not.toThrow();
  });

  it("rejects invalid function names", () => {
    expect(() => new InvocationBuilder(swap, "not-a-symbol")).toThrow(ValidationError);
  });

  it("rejects contract IDs that are not 32 bytes", () => {
    expect(() => new InvocationBuilder(Buffer.alloc(31), "swap")).toThrow(ValidationError);
  });
});

describe("walkInvocations", () => {
  it("visits nodes in pre-order with depth", () => {
    const root = new InvocationBuilder(swap, "a");
    const b = root.addSubInvocation(tokenA, "b");
    b.addSubInvocation(tokenB, "c");
    root.addSubInvocation(tokenB, "d");
    const tree = root.build();

    const visited = [...walkInvocations(tree)].map(({ node, depth }) => `${node.functionName}@${depth}`);
    expect(visited).toEqual(["a@1", "b@2", "c@3", "d@2"]);
    expect(countInvocations(tree)).toBe(4);
  });
});

describe("invocationFromFunction", () => {
  it("extracts the root call of a contract invocation", () => {
    const fn = invokeContractFunction(swap, "swap", [scvU32(7)]);
    expect(invocationFromFunction(fn)).toEqual({
      contractId: swap,
      functionName: "swap",
      args: [scvU32(7)],
      subInvocations: [],
    });
  });

  it("rejects other host functions", () => {
    expect(() => invocationFromFunction(uploadWasmFunction(Buffer.from([1])))).toThrow(
      MalformedInputError
    );
  });
});

describe("validateInvocation", () => {
  it("rejects a node shared by two parents", () => {
    const shared = leaf(tokenA, "transfer");
    const tree: AuthorizedInvocation = {
      ...leaf(swap, "swap"),
      subInvocations: [shared, shared],
    };
    expect(() => validateInvocation(tree)).toThrow(MalformedInputError);
  });

  it("rejects a cycle", () => {
    const node = leaf(swap, "swap");
    node.subInvocations.push(node);
    expect(() => validateInvocation(node)).toThrow(MalformedInputError);
  });

  it("enforces the configured node count", () => {
    const tree: AuthorizedInvocation = {
      ...leaf(swap, "swap"),
      subInvocations: [leaf(tokenA, "transfer"), leaf(tokenB, "transfer")],
    };
    expect(() => validateInvocation(tree, { maxInvocations: 3 })).not.toThrow();
    expect(() => validateInvocation(tree, { maxInvocations: 2 })).toThrow(LimitExceededError);
  });

  it("enforces the configured depth", () => {
    const tree: AuthorizedInvocation = {
      ...leaf(swap, "swap"),
      subInvocations: [leaf(tokenA, "transfer")],
    };
    expect(() => validateInvocation(tree, { maxDepth: 2 })).not.toThrow();
    expect(() => validateInvocation(tree, { maxDepth: 1 })).toThrow(LimitExceededError);
  });

  it("falls back to the codec nesting bound for depth", () => {
    const tree: AuthorizedInvocation = {
      ...leaf(swap, "swap"),
      subInvocations: [leaf(tokenA, "transfer")],
    };
    expect(() => validateInvocation(tree, { codec: { maxDepth: 1 } })).toThrow(LimitExceededError);
  });

  it("rejects malformed contract IDs and names", () => {
    expect(() => validateInvocation(leaf(Buffer.alloc(31), "swap"))).toThrow(MalformedInputError);
    expect(() => validateInvocation(leaf(swap, "bad name"))).toThrow(MalformedInputError);
  });

  it("bounds argument count by the value limit", () => {
    const tree: AuthorizedInvocation = { ...leaf(swap, "swap"), args: [scvU32(1), scvU32(2)] };
    expect(() => validateInvocation(tree, { codec: { scValLimit: 1 } })).toThrow(LimitExceededError);
  });
});
