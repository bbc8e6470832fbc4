/**
 * Invocation tree model.
 *
 * An AuthorizedInvocation tree mirrors the require_auth call graph of one
 * top-level call: each node is one authorization-checked call and its
 * children are calls made from that invocation's context.
 *
 * @packageDocumentation
 */

import { HASH_SIZE } from "./constants";
import { LimitExceededError, MalformedInputError, SorobanAuthErrorCode, ValidationError } from "./errors";
import { parseInvokeContractArgs, validateSymbol } from "./builders";
import { validateHash32 } from "./utils";
import { resolveLimits, type CodecLimits } from "./xdr/io";
import type { AuthorizedInvocation, HostFunction, ScVal } from "./xdr/types";

/**
 * Bounds applied by {@link validateInvocation}.
 *
 * `maxInvocations` is a network parameter with no default; when omitted it
 * is not enforced. `maxDepth` falls back to the codec nesting bound.
 */
export interface InvocationLimits {
  maxInvocations?: number;
  maxDepth?: number;
  codec?: Partial<CodecLimits>;
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Assembles an AuthorizedInvocation tree top-down or bottom-up.
 *
 * Every node has its own builder, so children can be appended to any node.
 * `build()` on the root freezes the whole tree and seals every builder.
 *
 * @example
 * ```typescript
 * const root = new InvocationBuilder(swapId, "swap", [scvAddress(a), scvAddress(b)]);
 * root.addSubInvocation(tokenA, "increase_allowance", [scvAddress(a), scvAddress(swapAddr), scvI128(100n)]);
 * const tree = root.build();
 * ```
 */
export class InvocationBuilder {
  private readonly contractId: Buffer;
  private readonly functionName: string;
  private readonly args: ScVal[];
  private readonly children: InvocationBuilder[] = [];
  private sealed = false;

  constructor(contractId: Buffer, functionName: string, args: ScVal[] = []) {
    validateHash32(contractId, "contractId");
    validateSymbol(functionName, "functionName");
    this.contractId = Buffer.from(contractId);
    this.functionName = functionName;
    this.args = [...args];
  }

  /**
   * Append a child call and return its builder.
   */
  addSubInvocation(contractId: Buffer, functionName: string, args: ScVal[] = []): InvocationBuilder {
    const child = new InvocationBuilder(contractId, functionName, args);
    this.attach(child);
    return child;
  }

  /**
   * Append an already-built subtree. The subtree is copied, so the caller's
   * value is never aliased into this tree.
   */
  addSubtree(tree: AuthorizedInvocation): InvocationBuilder {
    const child = InvocationBuilder.from(tree);
    this.attach(child);
    return child;
  }

  /**
   * Produce an immutable tree and seal this builder and its descendants.
   */
  build(): AuthorizedInvocation {
    this.sealed = true;
    const args = [...this.args];
    const subInvocations = this.children.map((child) => child.build());
    Object.freeze(args);
    Object.freeze(subInvocations);
    const node: AuthorizedInvocation = {
      contractId: Buffer.from(this.contractId),
      functionName: this.functionName,
      args,
      subInvocations,
    };
    Object.freeze(node);
    return node;
  }

  /**
   * Rebuild a builder from an existing tree (deep copy).
   */
  static from(tree: AuthorizedInvocation): InvocationBuilder {
    const builder = new InvocationBuilder(tree.contractId, tree.functionName, tree.args);
    for (const sub of tree.subInvocations) {
      builder.attach(InvocationBuilder.from(sub));
    }
    return builder;
  }

  private attach(child: InvocationBuilder): void {
    if (this.sealed) {
      throw new ValidationError(
        "Cannot add sub-invocations after the tree has been built",
        SorobanAuthErrorCode.INVALID_INPUT,
        { functionName: this.functionName }
      );
    }
    this.children.push(child);
  }
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Visit every node in pre-order, together with its depth (root = 1).
 */
export function* walkInvocations(
  tree: AuthorizedInvocation
): Generator<{ node: AuthorizedInvocation; depth: number }> {
  const stack: { node: AuthorizedInvocation; depth: number }[] = [{ node: tree, depth: 1 }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    yield entry;
    const { node, depth } = entry;
    for (let i = node.subInvocations.length - 1; i >= 0; i--) {
      stack.push({ node: node.subInvocations[i], depth: depth + 1 });
    }
  }
}

export function countInvocations(tree: AuthorizedInvocation): number {
  let count = 0;
  for (const _ of walkInvocations(tree)) count++;
  return count;
}

/**
 * The root invocation node of an InvokeContract host function.
 */
export function invocationFromFunction(fn: HostFunction): AuthorizedInvocation {
  if (fn.args.tag !== "InvokeContract") {
    throw new MalformedInputError(`Host function ${fn.args.tag} is not a contract invocation`);
  }
  const call = parseInvokeContractArgs(fn.args.args);
  return {
    contractId: call.contractId,
    functionName: call.functionName,
    args: call.args,
    subInvocations: [],
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check the shape of an invocation tree.
 *
 * @throws {MalformedInputError} If a node is reachable twice (shared or
 * cyclic references), has a bad contract ID or an invalid function name
 * @throws {LimitExceededError} If node count, depth or a node's sequence
 * lengths exceed their bounds
 */
export function validateInvocation(tree: AuthorizedInvocation, limits: InvocationLimits = {}): void {
  const codec = resolveLimits(limits.codec);
  const seen = new Set<AuthorizedInvocation>();
  const stack: { node: AuthorizedInvocation; depth: number }[] = [{ node: tree, depth: 1 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const { node, depth } = entry;

    if (seen.has(node)) {
      throw new MalformedInputError("Invocation tree contains a shared or cyclic node", {
        functionName: node.functionName,
      });
    }
    seen.add(node);

    if (limits.maxInvocations !== undefined && seen.size > limits.maxInvocations) {
      throw new LimitExceededError("Invocation count", limits.maxInvocations, seen.size);
    }
    const depthLimit = limits.maxDepth ?? codec.maxDepth;
    if (depth > depthLimit) {
      throw new LimitExceededError("Invocation depth", depthLimit, depth);
    }
    if (node.contractId.length !== HASH_SIZE) {
      throw new MalformedInputError("Invocation contractId must be 32 bytes", {
        functionName: node.functionName,
        actualLength: node.contractId.length,
      });
    }
    try {
      validateSymbol(node.functionName, "functionName");
    } catch (err) {
      throw new MalformedInputError(
        err instanceof Error ? err.message : `Invalid function name ${node.functionName}`
      );
    }
    if (node.args.length > codec.scValLimit) {
      throw new LimitExceededError("Invocation args", codec.scValLimit, node.args.length);
    }

    for (const sub of node.subInvocations) {
      stack.push({ node: sub, depth: depth + 1 });
    }
  }
}
