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

import { splitSelectorList } from './selectorEvaluator';
import { debugLogger } from './utils/debugLogger';
import { normalizeColor, normalizeUnit } from './valueNormalizer';

import type { SelectorEvaluator } from './selectorEvaluator';
import type { ComputedStyle, ElementRecord, StyleDeclarations, StyleRule } from './types';

const unitProperties = new Set([
  'font-size',
  'margin',
  'margin-top',
  'margin-bottom',
  'padding',
  'padding-top',
  'padding-bottom',
  'width',
  'height',
]);

export const emptyComputedStyle: ComputedStyle = {
  getPropertyValue: () => '',
};

export class StyleSheetCascade {
  private _evaluator: SelectorEvaluator;
  private _rules: StyleRule[] = [];

  constructor(evaluator: SelectorEvaluator, styleSheets: readonly string[] = []) {
    this._evaluator = evaluator;
    this.setStyleSheets(styleSheets);
  }

  setStyleSheets(styleSheets: readonly string[]) {
    this._rules = buildRules(styleSheets);
    debugLogger.log('cssom', `built ${this._rules.length} rule(s) from ${styleSheets.length} stylesheet(s)`);
  }

  rules(): readonly StyleRule[] {
    return this._rules;
  }

  matchedRules(element: ElementRecord): StyleRule[] {
    const matched = this._rules.filter(rule => this._evaluator.matches(element, rule.selector));
    matched.sort((a, b) => {
      if (a.specificity !== b.specificity)
        return a.specificity - b.specificity;
      return a.order - b.order;
    });
    return matched;
  }

  // Not cached: attributes may have changed since the previous call.
  computedStyle(element: ElementRecord | null | undefined): ComputedStyle {
    if (!element)
      return emptyComputedStyle;
    const declarations: StyleDeclarations = new Map();
    for (const rule of this.matchedRules(element)) {
      for (const [name, value] of rule.declarations)
        declarations.set(name, value);
    }
    const inlineStyle = element.attributes.find(([name]) => name === 'style');
    if (inlineStyle) {
      for (const [name, value] of parseDeclarations(inlineStyle[1]))
        declarations.set(name, value);
    }
    return {
      getPropertyValue: (property: string) => {
        const name = property.trim().toLowerCase();
        const value = declarations.get(name);
        if (value === undefined)
          return '';
        return normalizePropertyValue(name, value);
      },
    };
  }
}

export function normalizePropertyValue(property: string, value: string): string {
  if (property.includes('color') || property === 'background')
    return normalizeColor(value);
  if (unitProperties.has(property))
    return normalizeUnit(value);
  return value.trim();
}

export function parseDeclarations(text: string): StyleDeclarations {
  const declarations: StyleDeclarations = new Map();
  for (const declaration of text.split(';')) {
    const colon = declaration.indexOf(':');
    if (colon === -1)
      continue;
    const name = declaration.substring(0, colon).trim().toLowerCase();
    if (!name)
      continue;
    declarations.set(name, declaration.substring(colon + 1).trim());
  }
  return declarations;
}

/**
 * Coarse, total-ordered specificity: ids weigh 10000, classes and attribute
 * selectors 100, tag names 1. Pseudo-classes do not count.
 */
export function computeSpecificity(selector: string): number {
  const attributes = (selector.match(/\[[^\]]+\]/g) || []).length;
  const withoutAttributes = selector.replace(/\[[^\]]+\]/g, '');
  const ids = (withoutAttributes.match(/#[\w-]+/g) || []).length;
  const classes = (withoutAttributes.match(/\.[\w-]+/g) || []).length;
  const rest = withoutAttributes
      .replace(/#[\w-]+/g, '')
      .replace(/\.[\w-]+/g, '')
      .replace(/:[\w-]+/g, '')
      .trim();
  const tags = (rest.match(/[a-zA-Z][\w-]*/g) || []).length;
  return ids * 10000 + (classes + attributes) * 100 + tags;
}

/**
 * Extracts `selector-list { declarations }` blocks in source order. Each
 * comma branch becomes its own rule with its own specificity and order.
 * A block that never closes, or that opens another block before closing,
 * is dropped and scanning resumes with the next block.
 */
export function buildRules(styleSheets: readonly string[]): StyleRule[] {
  const rules: StyleRule[] = [];
  for (const styleSheet of styleSheets) {
    const text = styleSheet.replace(/\/\*[\s\S]*?\*\//g, '');
    let position = 0;
    while (position < text.length) {
      const open = text.indexOf('{', position);
      if (open === -1)
        break;
      const close = text.indexOf('}', open + 1);
      if (close === -1)
        break;
      const nextOpen = text.indexOf('{', open + 1);
      if (nextOpen !== -1 && nextOpen < close) {
        // Unbalanced block: resume right after its last complete declaration.
        const lastSemicolon = text.lastIndexOf(';', nextOpen);
        position = lastSemicolon > open ? lastSemicolon + 1 : open + 1;
        continue;
      }
      const prelude = text.substring(position, open);
      const selectorText = prelude.substring(prelude.lastIndexOf('}') + 1).trim();
      position = close + 1;
      if (!selectorText || selectorText.startsWith('@'))
        continue;
      const declarations = parseDeclarations(text.substring(open + 1, close));
      for (const selector of splitSelectorList(selectorText))
        rules.push({ selector, declarations, specificity: computeSpecificity(selector), order: rules.length });
    }
  }
  return rules;
}
