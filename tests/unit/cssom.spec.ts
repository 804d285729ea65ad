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

import { test, expect } from '@playwright/test';
import { buildRules, computeSpecificity, parseDeclarations, StyleSheetCascade } from '../../packages/pageshim/src/cssom';
import { SelectorEvaluator } from '../../packages/pageshim/src/selectorEvaluator';
import { createElements } from './pageFixture';

import type { ElementRecord } from '../../packages/pageshim/src/types';

function createTarget(): ElementRecord {
  return { tag: 'div', id: 'b', class: 'a', attributes: [['id', 'b'], ['class', 'a']] };
}

test.describe('buildRules', () => {
  test('should expand selector lists into separate rules', () => {
    const rules = buildRules(['h1, .title { font-size: 12 ; COLOR: Red }']);
    expect(rules.map(rule => [rule.selector, rule.specificity, rule.order])).toEqual([
      ['h1', 1, 0],
      ['.title', 100, 1],
    ]);
    expect([...rules[0].declarations]).toEqual([['font-size', '12'], ['color', 'Red']]);
    expect(rules[1].declarations).toBe(rules[0].declarations);
  });

  test('should keep counting order across stylesheets', () => {
    const rules = buildRules(['p { margin: 0 }', 'p { margin: 1 }']);
    expect(rules.map(rule => rule.order)).toEqual([0, 1]);
  });

  test('should skip comments and at-rules', () => {
    const rules = buildRules([`/* .hidden { color: red } */ @font-face { font-family: x } .shown { color: blue }`]);
    expect(rules.map(rule => rule.selector)).toEqual(['.shown']);
  });

  test('should recover from an unclosed block', () => {
    const rules = buildRules(['.x { color: red; .y { color: blue } .z { color: green }']);
    expect(rules.map(rule => rule.selector)).toEqual(['.y', '.z']);
    expect(rules[0].declarations.get('color')).toBe('blue');
  });

  test('should ignore a block that never closes', () => {
    expect(buildRules(['.x { color: red'])).toEqual([]);
  });
});

test.describe('computeSpecificity', () => {
  test('should weigh ids over classes over tags', () => {
    expect(computeSpecificity('ul > li')).toBe(2);
    expect(computeSpecificity('.a.b')).toBe(200);
    expect(computeSpecificity('#a .b [c] d:hover')).toBe(10201);
  });

  test('should not count dots inside attribute values', () => {
    expect(computeSpecificity('a[href$=".pdf"]')).toBe(101);
  });
});

test('parseDeclarations should lower-case names and skip broken entries', () => {
  expect([...parseDeclarations(' Color : red ; broken; :x; width:10px')]).toEqual([
    ['color', 'red'],
    ['width', '10px'],
  ]);
});

test.describe('computed style', () => {
  test('should let an id rule outrank later class rules', () => {
    const target = createTarget();
    const cascade = new StyleSheetCascade(new SelectorEvaluator([target]), ['.a{color:red} #b{color:blue} .a{color:green}']);
    expect(cascade.computedStyle(target).getPropertyValue('color')).toBe('#0000ff');
  });

  test('should let the later rule win a specificity tie', () => {
    const target = createTarget();
    const cascade = new StyleSheetCascade(new SelectorEvaluator([target]), ['.a{color:red} #b{color:blue} .a{color:green}']);
    cascade.setStyleSheets(['.a{color:red} .a{color:green}']);
    expect(cascade.rules().map(rule => rule.order)).toEqual([0, 1]);
    expect(cascade.computedStyle(target).getPropertyValue('color')).toBe('#008000');
  });

  test('should sort matched rules by specificity then order', () => {
    const target = createTarget();
    const cascade = new StyleSheetCascade(new SelectorEvaluator([target]), ['#b{color:blue} div{color:black} .a{color:red}']);
    expect(cascade.matchedRules(target).map(rule => rule.selector)).toEqual(['div', '.a', '#b']);
  });

  test('should apply the inline style last', () => {
    const elements = createElements();
    const cascade = new StyleSheetCascade(new SelectorEvaluator(elements), ['#note { color: blue; margin: 2 }']);
    const style = cascade.computedStyle(elements[5]);
    expect(style.getPropertyValue('color')).toBe('#ff0000');
    expect(style.getPropertyValue('margin')).toBe('2px');
  });

  test('should normalize by property name', () => {
    const elements = createElements();
    const cascade = new StyleSheetCascade(new SelectorEvaluator(elements), [
      'ul { background: White; border-color: rgba(0,0,0,0.5); width: 100; line-height: 2; font-family:  Arial  }',
    ]);
    const style = cascade.computedStyle(elements[1]);
    expect(style.getPropertyValue('background')).toBe('#ffffff');
    expect(style.getPropertyValue('border-color')).toBe('rgba(0,0,0,0.5)');
    expect(style.getPropertyValue(' WIDTH ')).toBe('100px');
    expect(style.getPropertyValue('line-height')).toBe('2');
    expect(style.getPropertyValue('font-family')).toBe('Arial');
  });

  test('should return empty strings for unknown properties and missing elements', () => {
    const elements = createElements();
    const cascade = new StyleSheetCascade(new SelectorEvaluator(elements), ['li { color: red }']);
    expect(cascade.computedStyle(elements[2]).getPropertyValue('display')).toBe('');
    expect(cascade.computedStyle(null).getPropertyValue('color')).toBe('');
    expect(cascade.computedStyle(undefined).getPropertyValue('color')).toBe('');
  });

  test('should see attribute changes made after the first read', () => {
    const elements = createElements();
    const cascade = new StyleSheetCascade(new SelectorEvaluator(elements), ['.active { color: green }']);
    expect(cascade.computedStyle(elements[3]).getPropertyValue('color')).toBe('');
    elements[3].class = 'item active';
    expect(cascade.computedStyle(elements[3]).getPropertyValue('color')).toBe('#008000');
  });
});
