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

import { debugLogger } from './utils/debugLogger';

export type Microtask = () => void;
export type ErrorReporter = (error: unknown) => void;

type Ticks = number & { readonly __brand: 'Ticks' };

type Timer = {
  id: number;
  func: unknown;
  args: unknown[];
  // Zero for one-shot timers.
  interval: number;
  callAt: Ticks;
  createdAt: Ticks;
};

export type SchedulerOptions = {
  maxDrainIterations?: number;
  reportError?: ErrorReporter;
  // Runs after every callback, e.g. to flush a script context's own job queue.
  afterCallback?: () => void;
};

export type SchedulerApi = {
  setTimeout(func: unknown, timeout?: unknown, ...args: unknown[]): number;
  clearTimeout(timerId?: unknown): void;
  setInterval(func: unknown, timeout?: unknown, ...args: unknown[]): number;
  clearInterval(timerId?: unknown): void;
  queueMicrotask(callback: unknown): void;
};

export const kDefaultMaxDrainIterations = 10000;
const kMaxMicrotasksPerDrain = 1000000;
const maxTimeout = Math.pow(2, 31) - 1;

/**
 * Single-threaded event loop over a logical millisecond clock. Nothing here
 * is coupled to wall-clock time: timers only become due when the host
 * advances the clock.
 */
export class TaskScheduler {
  private _now = 0 as Ticks;
  private _timers = new Map<number, Timer>();
  private _microtasks: Microtask[] = [];
  private _uniqueTimerId = 1;
  private _maxDrainIterations: number;
  private _reportError: ErrorReporter;
  private _afterCallback: (() => void) | undefined;

  constructor(options: SchedulerOptions = {}) {
    this._maxDrainIterations = options.maxDrainIterations ?? kDefaultMaxDrainIterations;
    this._reportError = options.reportError ?? (error => debugLogger.log('error', error instanceof Error ? error : String(error)));
    this._afterCallback = options.afterCallback;
  }

  reportError(error: unknown) {
    this._reportError(error);
  }

  now(): number {
    return this._now;
  }

  countTimers(): number {
    return this._timers.size;
  }

  pendingMicrotasks(): number {
    return this._microtasks.length;
  }

  enqueueMicrotask(task: Microtask) {
    this._microtasks.push(task);
  }

  setTimer(func: unknown, delay?: unknown, interval?: unknown, args: unknown[] = []): number {
    const timer: Timer = {
      id: this._uniqueTimerId++,
      func,
      args,
      interval: interval ? Math.max(1, parseDelay(interval)) : 0,
      callAt: shiftTicks(this._now, parseDelay(delay)),
      createdAt: this._now,
    };
    this._timers.set(timer.id, timer);
    return timer.id;
  }

  cancelTimer(timerId: unknown) {
    const id = Number(timerId);
    if (Number.isNaN(id))
      return;
    this._timers.delete(id);
  }

  drainMicrotasks() {
    let count = 0;
    while (this._microtasks.length) {
      if (++count > kMaxMicrotasksPerDrain) {
        debugLogger.log('scheduler', `microtask drain stopped after ${kMaxMicrotasksPerDrain} tasks`);
        return;
      }
      const task = this._microtasks.shift();
      if (task)
        this._invoke(task, []);
    }
  }

  runOneMacrotask(): boolean {
    const timer = this._firstDueTimer(this._now);
    if (!timer)
      return false;
    this._fireTimer(timer);
    return true;
  }

  drainUntilIdle(maxIterations = this._maxDrainIterations) {
    for (let i = 0; i < maxIterations; i++) {
      this.drainMicrotasks();
      if (!this.runOneMacrotask())
        break;
      if (i === maxIterations - 1)
        debugLogger.log('scheduler', `drain stopped after ${maxIterations} iterations at ${this._now}ms`);
    }
    this.drainMicrotasks();
  }

  /**
   * Moves the clock forward by |ticks|, firing every timer that becomes due
   * on the way. The clock is set to each timer's due time before it fires,
   * so an interval registered for 10ms fires at 10 and 20 within a 25ms
   * advance.
   */
  advanceClock(ticks: number | string) {
    const ms = parseTicks(ticks);
    if (!Number.isFinite(ms))
      throw new TypeError(`Invalid ticks ${String(ticks)}`);
    if (ms < 0)
      throw new TypeError('Negative ticks are not supported');
    const to = shiftTicks(this._now, Math.ceil(ms));
    debugLogger.log('scheduler', `advancing clock from ${this._now}ms to ${to}ms`);

    let iterations = 0;
    for (; iterations < this._maxDrainIterations; iterations++) {
      this.drainMicrotasks();
      const timer = this._firstDueTimer(to);
      if (!timer)
        break;
      if (timer.callAt > this._now)
        this._now = timer.callAt;
      this._fireTimer(timer);
    }
    this._now = to;
    this.drainUntilIdle(Math.max(0, this._maxDrainIterations - iterations));
  }

  reset() {
    this._timers.clear();
    this._microtasks = [];
  }

  // Overdue timers fire in registration order rather than due-time order.
  private _firstDueTimer(beforeTick: number): Timer | undefined {
    for (const timer of this._timers.values()) {
      if (timer.callAt <= beforeTick)
        return timer;
    }
  }

  private _fireTimer(timer: Timer) {
    this._timers.delete(timer.id);
    // Re-inserted before the callback runs so that the callback can cancel it.
    if (timer.interval) {
      timer.callAt = shiftTicks(this._now, timer.interval);
      this._timers.set(timer.id, timer);
    }
    if (typeof timer.func === 'function')
      this._invoke(timer.func, timer.args);
  }

  private _invoke(func: Function, args: unknown[]) {
    try {
      func.apply(null, args);
    } catch (e) {
      this._reportError(e);
    }
    if (!this._afterCallback)
      return;
    try {
      this._afterCallback();
    } catch (e) {
      this._reportError(e);
    }
  }
}

export function createSchedulerApi(scheduler: TaskScheduler): SchedulerApi {
  return {
    setTimeout: (func: unknown, timeout?: unknown, ...args: unknown[]): number => {
      return scheduler.setTimer(func, timeout, 0, args);
    },
    clearTimeout: (timerId?: unknown): void => {
      if (timerId)
        scheduler.cancelTimer(timerId);
    },
    setInterval: (func: unknown, timeout?: unknown, ...args: unknown[]): number => {
      const delay = parseDelay(timeout);
      return scheduler.setTimer(func, delay, Math.max(1, delay), args);
    },
    clearInterval: (timerId?: unknown): void => {
      if (timerId)
        scheduler.cancelTimer(timerId);
    },
    queueMicrotask: (callback: unknown): void => {
      if (typeof callback !== 'function')
        throw new TypeError(`The "callback" argument must be of type function`);
      scheduler.enqueueMicrotask(() => callback());
    },
  };
}

function parseDelay(value: unknown): number {
  let delay = value ? Number(value) : 0;
  if (!Number.isFinite(delay))
    delay = 0;
  delay = delay > maxTimeout ? 1 : delay;
  return Math.max(0, Math.floor(delay));
}

/**
 * Accepts milliseconds or a `mm:ss` / `hh:mm:ss` string.
 */
export function parseTicks(value: number | string): number {
  if (typeof value === 'number')
    return value;
  if (!value)
    return 0;
  const str = value;

  const strings = str.split(':');
  const l = strings.length;
  let i = l;
  let ms = 0;

  if (l > 3 || !/^(\d\d:){0,2}\d\d?$/.test(str))
    throw new Error(`Clock only understands numbers, 'mm:ss' and 'hh:mm:ss'`);

  while (i--) {
    const parsed = parseInt(strings[i], 10);
    if (parsed >= 60)
      throw new Error(`Invalid time ${str}`);
    ms += parsed * Math.pow(60, l - i - 1);
  }

  return ms * 1000;
}

function shiftTicks(ticks: Ticks, ms: number): Ticks {
  return ticks + ms as Ticks;
}
