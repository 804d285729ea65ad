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

import * as vm from 'vm';

import { ConsoleSink } from './consoleApi';
import { emptyComputedStyle, StyleSheetCascade } from './cssom';
import { bindDeferredValue } from './deferredValue';
import { DomBindings, ElementHandle } from './elementHandle';
import { errorMessage, errorStack, isError, ScriptTimeoutError } from './errors';
import { createSchedulerApi, kDefaultMaxDrainIterations, TaskScheduler } from './scheduler';
import { SelectorEvaluator } from './selectorEvaluator';
import { debugLogger } from './utils/debugLogger';
import { getAsNumberFromENV } from './utils/env';

import type { ScriptConsole } from './consoleApi';
import type { DeferredValueConstructor } from './deferredValue';
import type { SchedulerApi } from './scheduler';
import type { ComputedStyle, ConsoleChannel, PageSnapshot, ScriptResult } from './types';

export type PageRuntimeOptions = {
  maxDrainIterations?: number;
  scriptTimeoutMs?: number;
  onConsole?: ConsoleChannel;
  scriptFilename?: string;
};

export type PageDocument = {
  title: string;
  body: string;
  styles: string[];
  querySelector(selector: string): ElementHandle;
  querySelectorAll(selector: string): ElementHandle[];
};

export type PageGlobals = SchedulerApi & {
  document: PageDocument;
  console: ScriptConsole;
  querySelector(selector: string): ElementHandle;
  querySelectorAll(selector: string): ElementHandle[];
  getComputedStyle(element: unknown): ComputedStyle;
  Promise?: DeferredValueConstructor;
};

export const kDefaultScriptTimeoutMs = 5000;
const kDefaultScriptFilename = 'page-script.js';

/**
 * Everything a page script can see, for one loaded page. Created when the
 * page loads and disposed on navigation.
 */
export class PageRuntime {
  readonly scheduler: TaskScheduler;
  readonly console: ConsoleSink;
  private _snapshot: PageSnapshot;
  private _evaluator: SelectorEvaluator;
  private _cascade: StyleSheetCascade;
  private _dom: DomBindings;
  private _scriptTimeoutMs: number;
  private _scriptFilename: string;
  private _context: vm.Context | undefined;

  constructor(snapshot: PageSnapshot, options: PageRuntimeOptions = {}) {
    this._snapshot = snapshot;
    this._scriptTimeoutMs = options.scriptTimeoutMs ?? getAsNumberFromENV('PAGESHIM_SCRIPT_TIMEOUT', kDefaultScriptTimeoutMs);
    this._scriptFilename = options.scriptFilename ?? kDefaultScriptFilename;
    this.console = new ConsoleSink(options.onConsole);
    this.scheduler = new TaskScheduler({
      maxDrainIterations: options.maxDrainIterations ?? getAsNumberFromENV('PAGESHIM_MAX_DRAIN_ITERATIONS', kDefaultMaxDrainIterations),
      reportError: error => this.console.report('error', errorMessage(error), errorStack(error)),
      afterCallback: () => this._runMicrotaskCheckpoint(),
    });
    this._evaluator = new SelectorEvaluator(snapshot.elements);
    this._cascade = new StyleSheetCascade(this._evaluator, snapshot.styles ?? []);
    this._dom = new DomBindings(this._evaluator);
    debugLogger.log('runtime', `page loaded with ${snapshot.elements.length} element(s)`);
  }

  querySelector(selector: string): ElementHandle {
    return this._dom.querySelector(selector);
  }

  querySelectorAll(selector: string): ElementHandle[] {
    return this._dom.querySelectorAll(selector);
  }

  getComputedStyle(element: unknown): ComputedStyle {
    if (!(element instanceof ElementHandle) || element.isNull())
      return emptyComputedStyle;
    return this._cascade.computedStyle(element.record());
  }

  setStyleSheets(styleSheets: readonly string[]) {
    this._cascade.setStyleSheets(styleSheets);
  }

  drainUntilIdle(maxIterations?: number) {
    this.scheduler.drainUntilIdle(maxIterations);
  }

  advanceClock(ticks: number | string) {
    this.scheduler.advanceClock(ticks);
  }

  takeConsoleBuffer(): string[] {
    return this.console.takeBuffered();
  }

  createGlobals(): PageGlobals {
    const querySelector = (selector: string) => this.querySelector(selector);
    const querySelectorAll = (selector: string) => this.querySelectorAll(selector);
    return {
      ...createSchedulerApi(this.scheduler),
      document: {
        title: this._snapshot.title ?? '',
        body: this._snapshot.body ?? '',
        styles: [...(this._snapshot.styles ?? [])],
        querySelector,
        querySelectorAll,
      },
      console: this.console.api(),
      querySelector,
      querySelectorAll,
      getComputedStyle: (element: unknown) => this.getComputedStyle(element),
    };
  }

  /**
   * Copies the page globals onto |target|. The deferred value is installed
   * as `Promise` only when the environment has no native one.
   */
  installGlobals(target: Record<string, unknown>, hasNativePromise = typeof target.Promise === 'function'): Record<string, unknown> {
    Object.assign(target, this.createGlobals());
    if (!hasNativePromise)
      target.Promise = bindDeferredValue(this.scheduler);
    return target;
  }

  /**
   * Runs |script| in the page's scripting context. Promise jobs it queues
   * run before this returns; timers and queued microtasks wait for the
   * caller to drain the scheduler or advance the clock.
   */
  evaluate(script: string): ScriptResult {
    const context = this._ensureContext();
    try {
      const value: unknown = vm.runInContext(script, context, {
        filename: this._scriptFilename,
        timeout: this._scriptTimeoutMs || undefined,
      });
      return { value: serializeScriptValue(value), isError: false };
    } catch (e) {
      if (isScriptTimeout(e)) {
        const error = new ScriptTimeoutError(this._scriptTimeoutMs);
        this.console.report('error', error.message);
        return { value: error.message, isError: true };
      }
      debugLogger.log('runtime', `script threw: ${errorMessage(e)}`);
      return { value: `Script thrown: ${errorMessage(e)}`, isError: true };
    }
  }

  dispose() {
    this.scheduler.reset();
    this._context = undefined;
    debugLogger.log('runtime', 'page disposed');
  }

  // The context owns its Promise job queue; it is flushed after the script
  // and after every scheduler callback, like a browser microtask checkpoint.
  private _runMicrotaskCheckpoint() {
    if (this._context)
      vm.runInContext('', this._context, { timeout: this._scriptTimeoutMs || undefined });
  }

  private _ensureContext(): vm.Context {
    if (!this._context) {
      const sandbox: Record<string, unknown> = {};
      const context = vm.createContext(sandbox, { microtaskMode: 'afterEvaluate' });
      this.installGlobals(sandbox, vm.runInContext('typeof Promise', context) === 'function');
      this._context = context;
    }
    return this._context;
  }
}

function isScriptTimeout(error: unknown): boolean {
  return isError(error) && Reflect.get(error, 'code') === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

export function serializeScriptValue(value: unknown): string {
  if (typeof value === 'string')
    return value;
  if (value === undefined)
    return 'undefined';
  if (typeof value === 'function' || typeof value === 'symbol')
    return String(value);
  if (typeof value === 'object' && value !== null && !isError(value)) {
    try {
      const json = JSON.stringify(value);
      if (json !== undefined)
        return json;
    } catch (e) {
      debugLogger.log('runtime', `result is not serializable: ${errorMessage(e)}`);
    }
  }
  return String(value);
}
