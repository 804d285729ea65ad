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

import { splitTokens, toCamelCase, toKebabCase } from './utils/stringUtils';

import type { SelectorEvaluator } from './selectorEvaluator';
import type { ElementRecord } from './types';

export type Dataset = Record<string, unknown> & {
  get(name: string): string | null;
  set(name: string, value: unknown): void;
};

/**
 * Script-facing view of one ElementRecord. Setters write through to the
 * record's attribute list and keep the `id`/`class` fields in sync.
 */
export class ElementHandle {
  readonly classList: ClassList;
  readonly dataset: Dataset;
  private _record: ElementRecord;
  private _bindings: DomBindings | undefined;

  constructor(record: ElementRecord, bindings?: DomBindings) {
    this._record = record;
    this._bindings = bindings;
    this.classList = new ClassList(this);
    this.dataset = createDataset(this);
  }

  // Handles for missing query results are detached from the document.
  isNull(): boolean {
    return !this._bindings;
  }

  record(): ElementRecord {
    return this._record;
  }

  get tag(): string {
    return this._record.tag;
  }

  get id(): string {
    return this._record.id ?? '';
  }

  get class(): string {
    return this._record.class ?? '';
  }

  get attributes(): [string, string][] {
    return this._record.attributes.map(([name, value]) => [name, value]);
  }

  getAttribute(name: string): string | null {
    const entry = this._record.attributes.find(([attributeName]) => attributeName === name);
    return entry ? entry[1] : null;
  }

  hasAttribute(name: string): boolean {
    return this.getAttribute(name) !== null;
  }

  setAttribute(name: string, value: unknown) {
    const stringValue = String(value);
    const entry = this._record.attributes.find(([attributeName]) => attributeName === name);
    if (entry)
      entry[1] = stringValue;
    else
      this._record.attributes.push([name, stringValue]);
    if (name === 'class')
      this._record.class = stringValue;
    else if (name === 'id')
      this._record.id = stringValue;
  }

  textContent(): string {
    return this._record.text ?? '';
  }

  innerHTML(value?: unknown): string {
    if (value !== undefined)
      this._record.text = String(value);
    return this.textContent();
  }

  querySelector(selector: string): ElementHandle {
    if (!this._bindings)
      return nullElementHandle();
    return this._bindings.querySelector(selector, this._record);
  }

  querySelectorAll(selector: string): ElementHandle[] {
    if (!this._bindings)
      return [];
    return this._bindings.querySelectorAll(selector, this._record);
  }

  toJSON() {
    return {
      tag: this.tag,
      id: this.id,
      class: this.class,
      attributes: this.attributes,
      text: this.textContent(),
    };
  }
}

export class ClassList {
  private _element: ElementHandle;

  constructor(element: ElementHandle) {
    this._element = element;
  }

  add(...tokens: string[]) {
    const classes = this._tokens();
    const added = tokens.filter(token => !classes.includes(token));
    if (added.length)
      this._element.setAttribute('class', [...classes, ...added].join(' '));
  }

  remove(...tokens: string[]) {
    const classes = this._tokens();
    const remaining = classes.filter(token => !tokens.includes(token));
    if (remaining.length !== classes.length)
      this._element.setAttribute('class', remaining.join(' '));
  }

  toggle(token: string, force?: boolean): boolean {
    const shouldAdd = force ?? !this.contains(token);
    if (shouldAdd)
      this.add(token);
    else
      this.remove(token);
    return shouldAdd;
  }

  contains(token: string): boolean {
    return this._tokens().includes(token);
  }

  length(): number {
    return this._tokens().length;
  }

  toString(): string {
    return this._element.class.trim();
  }

  private _tokens(): string[] {
    return splitTokens(this._element.class);
  }
}

function datasetAttributeName(name: string): string {
  return 'data-' + toKebabCase(name);
}

function datasetKeys(element: ElementHandle): string[] {
  return element.attributes.filter(([name]) => name.startsWith('data-')).map(([name]) => toCamelCase(name.substring(5)));
}

function createDataset(element: ElementHandle): Dataset {
  const methods: Dataset = {
    get: (name: string) => element.getAttribute(datasetAttributeName(name)),
    set: (name: string, value: unknown) => element.setAttribute(datasetAttributeName(name), value),
  };
  return new Proxy(methods, {
    get(target, property) {
      if (property === 'get' || property === 'set')
        return target[property];
      if (typeof property !== 'string')
        return undefined;
      return element.getAttribute(datasetAttributeName(property)) ?? undefined;
    },
    set(target, property, value) {
      if (typeof property !== 'string' || property === 'get' || property === 'set')
        return false;
      element.setAttribute(datasetAttributeName(property), value);
      return true;
    },
    has(target, property) {
      return typeof property === 'string' && element.hasAttribute(datasetAttributeName(property));
    },
    ownKeys() {
      return datasetKeys(element);
    },
    getOwnPropertyDescriptor(target, property) {
      if (typeof property !== 'string')
        return undefined;
      const value = element.getAttribute(datasetAttributeName(property));
      if (value === null)
        return undefined;
      return { value, writable: true, enumerable: true, configurable: true };
    },
  });
}

export function nullElementHandle(): ElementHandle {
  return new ElementHandle({ tag: '', id: '', class: '', attributes: [] });
}

/**
 * Hands out one ElementHandle per record, so that repeated queries for the
 * same element return the same object.
 */
export class DomBindings {
  private _evaluator: SelectorEvaluator;
  private _handles = new WeakMap<ElementRecord, ElementHandle>();

  constructor(evaluator: SelectorEvaluator) {
    this._evaluator = evaluator;
  }

  wrap(record: ElementRecord | undefined): ElementHandle {
    if (!record)
      return nullElementHandle();
    let handle = this._handles.get(record);
    if (!handle) {
      handle = new ElementHandle(record, this);
      this._handles.set(record, handle);
    }
    return handle;
  }

  querySelector(selector: string, scope?: ElementRecord): ElementHandle {
    return this.wrap(this._evaluator.queryFirst(String(selector), scope));
  }

  querySelectorAll(selector: string, scope?: ElementRecord): ElementHandle[] {
    return this._evaluator.queryAll(String(selector), scope).map(record => this.wrap(record));
  }
}
