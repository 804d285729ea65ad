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

import { splitTokens } from './utils/stringUtils';

import type { ElementRecord } from './types';

type Combinator = '' | '>';
// |combinator| relates this simple selector to the one on its right.
export type SimpleSelectorClause = { selector: string, combinator: Combinator };
export type ComplexSelector = { simples: SimpleSelectorClause[] };

const attributeSelectorRegex = /^\[([^~|^$*=\]]+)(?:([~^$*|]?=)\s*(?:['"]?([^'"]+)['"]?)\s*)?\]$/;
const pseudoClassRegex = /:([a-z-]+)$/;

/**
 * Matches elements of a flattened element list against selector text.
 * Unsupported or malformed selector text never throws, it matches nothing.
 */
export class SelectorEvaluator {
  private _elements: readonly ElementRecord[];
  private _cacheParse = new Map<string, ComplexSelector | null>();

  constructor(elements: readonly ElementRecord[]) {
    this._elements = elements;
  }

  elements(): readonly ElementRecord[] {
    return this._elements;
  }

  matches(element: ElementRecord, selector: string): boolean {
    return splitSelectorList(selector).some(branch => this._matchesBranch(element, branch));
  }

  queryFirst(selector: string, scope?: ElementRecord): ElementRecord | undefined {
    const branches = splitSelectorList(selector);
    return this._elements.find(element => this._isInScope(element, scope) && branches.some(branch => this._matchesBranch(element, branch)));
  }

  queryAll(selector: string, scope?: ElementRecord): ElementRecord[] {
    const branches = splitSelectorList(selector);
    return this._elements.filter(element => this._isInScope(element, scope) && branches.some(branch => this._matchesBranch(element, branch)));
  }

  matchesSimple(element: ElementRecord, simple: string): boolean {
    let selector = simple.trim();
    if (!selector)
      return false;

    const pseudoClass = selector.match(pseudoClassRegex);
    if (pseudoClass) {
      if (!this._matchesPseudoClass(element, pseudoClass[1]))
        return false;
      selector = selector.slice(0, selector.length - pseudoClass[0].length).trim();
      if (!selector)
        return true;
    }

    if (selector[0] === '#')
      return (element.id ?? '') === selector.slice(1);
    if (selector[0] === '.')
      return classTokens(element).includes(selector.slice(1));

    const attribute = selector.match(attributeSelectorRegex);
    if (attribute)
      return matchesAttribute(element, attribute[1].trim(), attribute[2], attribute[3]);
    if (selector[0] === '[')
      return false;

    const parts = selector.split('.');
    if (parts.length === 2)
      return element.tag.toLowerCase() === parts[0].toLowerCase() && classTokens(element).includes(parts[1]);
    return element.tag.toLowerCase() === selector.toLowerCase();
  }

  parentOf(element: ElementRecord): ElementRecord | undefined {
    if (element.parent === null || element.parent === undefined)
      return;
    return this._elements[element.parent];
  }

  private _matchesBranch(element: ElementRecord, branch: string): boolean {
    const complex = this._parse(branch);
    if (!complex)
      return false;
    const last = complex.simples.length - 1;
    if (!this.matchesSimple(element, complex.simples[last].selector))
      return false;
    return this._matchesParents(element, complex, last - 1);
  }

  private _matchesParents(element: ElementRecord, complex: ComplexSelector, index: number): boolean {
    if (index < 0)
      return true;
    const { selector: simple, combinator } = complex.simples[index];
    if (combinator === '>') {
      const parent = this.parentOf(element);
      if (!parent || !this.matchesSimple(parent, simple))
        return false;
      return this._matchesParents(parent, complex, index - 1);
    }
    let parent = this.parentOf(element);
    // Bounded by the list size so that a cyclic parent chain terminates.
    for (let steps = 0; parent && steps < this._elements.length; steps++) {
      if (this.matchesSimple(parent, simple)) {
        if (this._matchesParents(parent, complex, index - 1))
          return true;
        if (complex.simples[index - 1].combinator === '')
          break;
      }
      parent = this.parentOf(parent);
    }
    return false;
  }

  private _matchesPseudoClass(element: ElementRecord, name: string): boolean {
    const index = this._elements.indexOf(element);
    if (index === -1)
      return false;
    const parent = element.parent ?? null;
    const siblings: number[] = [];
    this._elements.forEach((candidate, i) => {
      if ((candidate.parent ?? null) === parent)
        siblings.push(i);
    });
    if (name === 'first-child')
      return siblings[0] === index;
    if (name === 'last-child')
      return siblings[siblings.length - 1] === index;
    return true;
  }

  private _isInScope(element: ElementRecord, scope: ElementRecord | undefined): boolean {
    if (!scope)
      return true;
    let parent = this.parentOf(element);
    for (let steps = 0; parent && steps < this._elements.length; steps++) {
      if (parent === scope)
        return true;
      parent = this.parentOf(parent);
    }
    return false;
  }

  private _parse(branch: string): ComplexSelector | null {
    let result = this._cacheParse.get(branch);
    if (result === undefined) {
      result = parseComplexSelector(branch);
      this._cacheParse.set(branch, result);
    }
    return result;
  }
}

function classTokens(element: ElementRecord): string[] {
  return splitTokens(element.class ?? '');
}

function attributeValue(element: ElementRecord, name: string): string | null {
  const entry = element.attributes.find(([attributeName]) => attributeName === name);
  return entry ? entry[1] : null;
}

function matchesAttribute(element: ElementRecord, name: string, operator: string | undefined, expected: string | undefined): boolean {
  const actual = attributeValue(element, name);
  if (operator === undefined)
    return actual !== null;
  if (actual === null || expected === undefined)
    return false;
  switch (operator) {
    case '=': return actual === expected;
    case '~=': return splitTokens(actual).includes(expected);
    case '^=': return actual.startsWith(expected);
    case '$=': return actual.endsWith(expected);
    case '*=': return actual.includes(expected);
    case '|=': return actual === expected || actual.startsWith(expected + '-');
  }
  return false;
}

/**
 * Splits a selector list on top-level commas; commas inside attribute
 * brackets or quotes do not separate branches.
 */
export function splitSelectorList(selector: string): string[] {
  const result: string[] = [];
  let depth = 0;
  let quote = '';
  let start = 0;
  for (let i = 0; i < selector.length; i++) {
    const c = selector[i];
    if (quote) {
      if (c === quote)
        quote = '';
    } else if (c === '"' || c === '\'') {
      quote = c;
    } else if (c === '[') {
      depth++;
    } else if (c === ']') {
      depth = Math.max(0, depth - 1);
    } else if (c === ',' && !depth) {
      result.push(selector.substring(start, i));
      start = i + 1;
    }
  }
  result.push(selector.substring(start));
  return result.map(branch => branch.trim()).filter(Boolean);
}

/**
 * Tokenizes one selector branch on whitespace, keeping `>` as a standalone
 * combinator. Returns null when combinators are misplaced.
 */
export function parseComplexSelector(branch: string): ComplexSelector | null {
  const tokens: string[] = [];
  let current = '';
  let depth = 0;
  let quote = '';
  const flush = () => {
    if (current)
      tokens.push(current);
    current = '';
  };
  for (const c of branch) {
    if (quote) {
      current += c;
      if (c === quote)
        quote = '';
      continue;
    }
    if (c === '"' || c === '\'')
      quote = c;
    else if (c === '[')
      depth++;
    else if (c === ']')
      depth = Math.max(0, depth - 1);
    if (!depth && /\s/.test(c)) {
      flush();
    } else if (!depth && c === '>') {
      flush();
      tokens.push('>');
    } else {
      current += c;
    }
  }
  flush();

  const simples: SimpleSelectorClause[] = [];
  for (const token of tokens) {
    if (token === '>') {
      const previous = simples[simples.length - 1];
      if (!previous || previous.combinator === '>')
        return null;
      previous.combinator = '>';
      continue;
    }
    simples.push({ selector: token, combinator: '' });
  }
  if (!simples.length || simples[simples.length - 1].combinator === '>')
    return null;
  return { simples };
}
