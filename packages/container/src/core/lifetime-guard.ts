/* LifetimeGuard
 *
 * Per-descriptor construction state for singletons:
 *
 *   unconstructed ──enter/acquire──▶ constructing ──success──▶ constructed
 *         ▲                               │
 *         └────────────failure────────────┘
 *
 * `constructed` is terminal. A failed attempt discards everything it built
 * and returns the guard to `unconstructed`, so a later resolution retries.
 *
 * The guard only serialises construction of its own descriptor. Cycle
 * detection is the resolver's job and uses the resolution chain, never the
 * guard; the chain recorded here is for diagnostics and for spotting an
 * async wait that could never finish.
 */

import type { ContractId } from './token.js';

export type GuardState = 'unconstructed' | 'constructing' | 'constructed';

const NO_HOLDER: readonly ContractId[] = Object.freeze([]);

export class LifetimeGuard {
  private _state: GuardState = 'unconstructed';
  private _holder: readonly ContractId[] = NO_HOLDER;
  private pending?: Promise<unknown>;

  get state(): GuardState {
    return this._state;
  }

  /** True while an asynchronous construction is in flight. */
  get isPending(): boolean {
    return this.pending !== undefined;
  }

  /**
   * Resolution chain that holds the guard, ending with the guarded contract.
   * Empty unless constructing.
   */
  get holder(): readonly ContractId[] {
    return this._holder;
  }

  /**
   * Start a synchronous construction.
   *
   * @throws Error when the guard is not `unconstructed`
   */
  enter(chain: readonly ContractId[]): void {
    if (this._state !== 'unconstructed') {
      throw new Error(`LifetimeGuard.enter() called while ${this._state}`);
    }
    this._state = 'constructing';
    this._holder = chain.slice();
  }

  /** Finish a synchronous construction started with `enter()`. */
  leave(succeeded: boolean): void {
    this._state = succeeded ? 'constructed' : 'unconstructed';
    this._holder = NO_HOLDER;
  }

  /**
   * Run `build` once. Callers arriving while it is in flight receive the same
   * promise; a failure is delivered to all of them.
   */
  acquire(chain: readonly ContractId[], build: () => Promise<unknown>): Promise<unknown> {
    if (this.pending) return this.pending;

    this._state = 'constructing';
    this._holder = chain.slice();
    const pending = Promise.resolve()
      .then(build)
      .then(
        (value) => {
          this.pending = undefined;
          this.leave(true);
          return value;
        },
        (err: unknown) => {
          this.pending = undefined;
          this.leave(false);
          throw err;
        }
      );
    this.pending = pending;
    return pending;
  }
}
