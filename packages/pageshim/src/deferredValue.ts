/**
 * Copyright (c) Microsoft Corporation.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 * http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import type { TaskScheduler } from './scheduler';

export type DeferredExecutor = (resolve: (value?: unknown) => void, reject: (reason?: unknown) => void) => void;
type Handler = ((value: unknown) => unknown) | null | undefined;

type DeferredState =
  { status: 'pending' } |
  { status: 'fulfilled', value: unknown } |
  { status: 'rejected', reason: unknown };

type Reaction = {
  onFulfilled: (value: unknown) => void;
  onRejected: (reason: unknown) => void;
};

/**
 * Settle-once asynchronous result driven by a TaskScheduler's microtask
 * queue. Used as the scripting environment's Promise when it has none.
 * Reactions always run from a microtask, never synchronously.
 */
export class DeferredValue {
  private _scheduler: TaskScheduler;
  private _state: DeferredState = { status: 'pending' };
  private _reactions: Reaction[] = [];
  // Set once resolve() or reject() has been called, even if the value is
  // still being adopted from a thenable.
  private _isLocked = false;
  private _hasReactions = false;

  constructor(scheduler: TaskScheduler, executor: DeferredExecutor) {
    if (typeof executor !== 'function')
      throw new TypeError(`Deferred value resolver ${String(executor)} is not a function`);
    this._scheduler = scheduler;
    try {
      executor(value => this._resolve(value), reason => this._reject(reason));
    } catch (e) {
      this._reject(e);
    }
  }

  static resolved(scheduler: TaskScheduler, value?: unknown): DeferredValue {
    if (value instanceof DeferredValue)
      return value;
    return new DeferredValue(scheduler, resolve => resolve(value));
  }

  static rejected(scheduler: TaskScheduler, reason: unknown): DeferredValue {
    return new DeferredValue(scheduler, (resolve, reject) => reject(reason));
  }

  status(): DeferredState['status'] {
    return this._state.status;
  }

  then(onFulfilled?: Handler, onRejected?: Handler): DeferredValue {
    const fulfilledHandler = typeof onFulfilled === 'function' ? onFulfilled : undefined;
    const rejectedHandler = typeof onRejected === 'function' ? onRejected : undefined;
    const derived = new DeferredValue(this._scheduler, () => {});
    this._addReaction({
      onFulfilled: value => {
        if (fulfilledHandler)
          derived._resolveWith(() => fulfilledHandler(value));
        else
          derived._resolve(value);
      },
      onRejected: reason => {
        if (rejectedHandler)
          derived._resolveWith(() => rejectedHandler(reason));
        else
          derived._reject(reason);
      },
    });
    return derived;
  }

  catch(onRejected?: Handler): DeferredValue {
    return this.then(undefined, onRejected);
  }

  get [Symbol.toStringTag]() {
    return 'DeferredValue';
  }

  private _addReaction(reaction: Reaction) {
    this._hasReactions = true;
    if (this._state.status === 'pending')
      this._reactions.push(reaction);
    else
      this._scheduleReaction(reaction);
  }

  private _scheduleReaction(reaction: Reaction) {
    const state = this._state;
    if (state.status === 'fulfilled')
      this._scheduler.enqueueMicrotask(() => reaction.onFulfilled(state.value));
    else if (state.status === 'rejected')
      this._scheduler.enqueueMicrotask(() => reaction.onRejected(state.reason));
  }

  private _resolveWith(handler: () => unknown) {
    let result: unknown;
    try {
      result = handler();
    } catch (e) {
      this._reject(e);
      return;
    }
    this._resolve(result);
  }

  private _resolve(value: unknown) {
    if (this._isLocked)
      return;
    this._isLocked = true;
    this._adopt(value);
  }

  private _reject(reason: unknown) {
    if (this._isLocked)
      return;
    this._isLocked = true;
    this._settle({ status: 'rejected', reason });
  }

  private _adopt(value: unknown) {
    if (value === this) {
      this._settle({ status: 'rejected', reason: new TypeError('Chaining cycle detected for deferred value') });
      return;
    }
    let then: unknown;
    if ((typeof value === 'object' && value !== null) || typeof value === 'function') {
      try {
        then = Reflect.get(value, 'then');
      } catch (e) {
        this._settle({ status: 'rejected', reason: e });
        return;
      }
    }
    if (typeof then !== 'function') {
      this._settle({ status: 'fulfilled', value });
      return;
    }
    const thenFunction = then;
    this._scheduler.enqueueMicrotask(() => {
      let called = false;
      try {
        thenFunction.call(value, (inner: unknown) => {
          if (called)
            return;
          called = true;
          this._adopt(inner);
        }, (reason: unknown) => {
          if (called)
            return;
          called = true;
          this._settle({ status: 'rejected', reason });
        });
      } catch (e) {
        if (!called) {
          called = true;
          this._settle({ status: 'rejected', reason: e });
        }
      }
    });
  }

  private _settle(state: DeferredState) {
    if (this._state.status !== 'pending')
      return;
    this._state = state;
    const reactions = this._reactions;
    this._reactions = [];
    for (const reaction of reactions)
      this._scheduleReaction(reaction);
    // A rejection still unobserved after one microtask is reported.
    if (state.status === 'rejected' && !this._hasReactions) {
      const reason = state.reason;
      this._scheduler.enqueueMicrotask(() => {
        if (!this._hasReactions)
          this._scheduler.reportError(reason);
      });
    }
  }
}

export type DeferredValueConstructor = {
  new (executor: DeferredExecutor): DeferredValue;
  resolve(value?: unknown): DeferredValue;
  reject(reason: unknown): DeferredValue;
};

/**
 * Binds DeferredValue to |scheduler| so that scripts can use it with the
 * standard `new Promise(executor)` / `Promise.resolve()` shape.
 */
export function bindDeferredValue(scheduler: TaskScheduler): DeferredValueConstructor {
  return class ScriptDeferredValue extends DeferredValue {
    constructor(executor: DeferredExecutor) {
      super(scheduler, executor);
    }

    static resolve(value?: unknown): DeferredValue {
      return DeferredValue.resolved(scheduler, value);
    }

    static reject(reason: unknown): DeferredValue {
      return DeferredValue.rejected(scheduler, reason);
    }
  };
}
