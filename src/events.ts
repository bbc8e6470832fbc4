/**
 * Event system for the transaction assembler.
 *
 * Provides a simple event emitter for authorization lifecycle events.
 *
 * @packageDocumentation
 */

import { consoleLogger, type Logger } from "./logging";

// ============================================================================
// Event Types
// ============================================================================

/**
 * All assembler events. Addresses are strkeys, contract IDs hex.
 */
export type SorobanAuthEventMap = {
  /** Emitted when a ContractAuth has been built and signed */
  authorizationSigned: { address: string | null; contractId: string; nonce: bigint | null };

  /** Emitted when a ContractAuth passes verification during assembly */
  authorizationVerified: { address: string | null; contractId: string };

  /** Emitted when an applied nonce is recorded */
  nonceObserved: { address: string; contractId: string; nonce: bigint };

  /** Emitted when an operation and its transaction data are assembled */
  operationAssembled: { functions: number; authorizations: number; refundableFee: bigint };
};

export type SorobanAuthEvent = keyof SorobanAuthEventMap;

export type EventListener<T> = (data: T) => void;

type ListenerSets = { [E in SorobanAuthEvent]: Set<EventListener<SorobanAuthEventMap[E]>> };

// ============================================================================
// Event Emitter
// ============================================================================

/**
 * Simple event emitter for assembler events.
 *
 * @example
 * ```typescript
 * const emitter = new SorobanAuthEventEmitter();
 *
 * emitter.on('authorizationSigned', ({ address, nonce }) => {
 *   console.log('Signed for', address, 'with nonce', nonce);
 * });
 * ```
 */
export class SorobanAuthEventEmitter {
  private listeners: ListenerSets = {
    authorizationSigned: new Set(),
    authorizationVerified: new Set(),
    nonceObserved: new Set(),
    operationAssembled: new Set(),
  };

  private errorHandler: (event: SorobanAuthEvent, error: unknown) => void;

  constructor(logger: Logger = consoleLogger) {
    this.errorHandler = (event, error) => logger.warn(`Listener for ${event} threw`, error);
  }

  /**
   * Replace the handler for listener errors. By default they are logged.
   */
  setErrorHandler(handler: (event: SorobanAuthEvent, error: unknown) => void): void {
    this.errorHandler = handler;
  }

  /**
   * Subscribe to an event.
   *
   * @returns An unsubscribe function
   */
  on<E extends SorobanAuthEvent>(
    event: E,
    listener: EventListener<SorobanAuthEventMap[E]>
  ): () => void {
    const listeners: Set<EventListener<SorobanAuthEventMap[E]>> = this.listeners[event];
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  /**
   * Subscribe to an event, but only trigger once.
   */
  once<E extends SorobanAuthEvent>(
    event: E,
    listener: EventListener<SorobanAuthEventMap[E]>
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      listener(data);
    });
    return unsubscribe;
  }

  off<E extends SorobanAuthEvent>(
    event: E,
    listener: EventListener<SorobanAuthEventMap[E]>
  ): void {
    const listeners: Set<EventListener<SorobanAuthEventMap[E]>> = this.listeners[event];
    listeners.delete(listener);
  }

  /**
   * Emit an event to all subscribers.
   *
   * Listener errors go to the error handler and do not reach the emitter's
   * caller or other listeners.
   */
  emit<E extends SorobanAuthEvent>(event: E, data: SorobanAuthEventMap[E]): void {
    const listeners: Set<EventListener<SorobanAuthEventMap[E]>> = this.listeners[event];
    for (const listener of [...listeners]) {
      try {
        listener(data);
      } catch (err) {
        this.errorHandler(event, err);
      }
    }
  }

  /**
   * Remove all listeners for one event, or for every event.
   */
  removeAllListeners(event?: SorobanAuthEvent): void {
    if (event) {
      this.listeners[event].clear();
    } else {
      Object.values(this.listeners).forEach((set) => set.clear());
    }
  }

  listenerCount(event: SorobanAuthEvent): number {
    return this.listeners[event].size;
  }
}
