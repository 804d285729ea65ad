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

export { ConsoleSink, formatArgs } from './consoleApi';
export type { ScriptConsole } from './consoleApi';
export { buildRules, computeSpecificity, emptyComputedStyle, normalizePropertyValue, parseDeclarations, StyleSheetCascade } from './cssom';
export { bindDeferredValue, DeferredValue } from './deferredValue';
export type { DeferredExecutor, DeferredValueConstructor } from './deferredValue';
export { ClassList, DomBindings, ElementHandle, nullElementHandle } from './elementHandle';
export type { Dataset } from './elementHandle';
export { isError, ScriptTimeoutError } from './errors';
export { kDefaultScriptTimeoutMs, PageRuntime, serializeScriptValue } from './pageRuntime';
export type { PageDocument, PageGlobals, PageRuntimeOptions } from './pageRuntime';
export { createSchedulerApi, kDefaultMaxDrainIterations, parseTicks, TaskScheduler } from './scheduler';
export type { ErrorReporter, Microtask, SchedulerApi, SchedulerOptions } from './scheduler';
export { parseComplexSelector, SelectorEvaluator, splitSelectorList } from './selectorEvaluator';
export type { ComplexSelector, SimpleSelectorClause } from './selectorEvaluator';
export type { AttributeEntry, ComputedStyle, ConsoleChannel, ConsoleMessage, ConsoleMessageLevel, ElementRecord, PageSnapshot, ScriptResult, StyleDeclarations, StyleRule } from './types';
export { normalizeColor, normalizeUnit } from './valueNormalizer';
