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
import { DomBindings } from '../../packages/pageshim/src/elementHandle';
import { SelectorEvaluator } from '../../packages/pageshim/src/selectorEvaluator';
import { createElements } from './pageFixture';

function setup() {
  const elements = createElements();
  const evaluator = new SelectorEvaluator(elements);
  return { elements, evaluator, dom: new DomBindings(evaluator) };
}

test.describe('element handle', () => {
  test('should expose the record fields', () => {
    const { dom } = setup();
    const note = dom.querySelector('#note');
    expect(note.tag).toBe('p');
    expect(note.id).toBe('note');
    expect(note.class).toBe('');
    expect(note.textContent()).toBe('Note');
    expect(note.getAttribute('style')).toBe('color: red');
    expect(note.getAttribute('missing')).toBe(null);
    expect(note.isNull()).toBe(false);
  });

  test('should return the same handle for the same element', () => {
    const { dom } = setup();
    expect(dom.querySelector('#note')).toBe(dom.querySelector('p'));
    expect(dom.querySelectorAll('li')[1]).toBe(dom.querySelector('[data-kind=vegetable]'));
  });

  test('should write attributes through to the record', () => {
    const { dom, elements, evaluator } = setup();
    const note = dom.querySelector('#note');
    note.setAttribute('class', 'x y');
    note.setAttribute('data-count', 3);
    expect(elements[5].class).toBe('x y');
    expect(note.getAttribute('data-count')).toBe('3');
    expect(evaluator.queryFirst('p.y')).toBe(elements[5]);
    note.setAttribute('id', 'renamed');
    expect(dom.querySelector('#renamed')).toBe(note);
  });

  test('should copy the attribute list', () => {
    const { dom } = setup();
    const note = dom.querySelector('#note');
    note.attributes.push(['title', 'ignored']);
    expect(note.getAttribute('title')).toBe(null);
  });

  test('should replace text through innerHTML', () => {
    const { dom } = setup();
    const item = dom.querySelector('li');
    expect(item.innerHTML()).toBe('Apple');
    expect(item.innerHTML('<b>Pear</b>')).toBe('<b>Pear</b>');
    expect(item.textContent()).toBe('<b>Pear</b>');
  });

  test('should query within the element', () => {
    const { dom } = setup();
    const list = dom.querySelector('ul');
    expect(list.querySelectorAll('li').map(item => item.textContent())).toEqual(['Apple', 'Carrot']);
    expect(list.querySelector('a').getAttribute('href')).toBe('/files/report.pdf');
    expect(dom.querySelector('li').querySelector('a').isNull()).toBe(true);
  });

  test('should serialize to a summary', () => {
    const { dom } = setup();
    expect(JSON.parse(JSON.stringify(dom.querySelector('a')))).toEqual({
      tag: 'a',
      id: '',
      class: '',
      attributes: [['href', '/files/report.pdf'], ['lang', 'en-US'], ['rel', 'nofollow noopener']],
      text: 'Report',
    });
  });
});

test.describe('classList', () => {
  test('should add and remove tokens', () => {
    const { dom } = setup();
    const item = dom.querySelectorAll('li')[1];
    item.classList.add('active', 'item');
    expect(item.getAttribute('class')).toBe('item active');
    expect(item.classList.length()).toBe(2);
    item.classList.remove('item');
    expect(item.classList.toString()).toBe('active');
    expect(item.class).toBe('active');
  });

  test('should toggle tokens', () => {
    const { dom } = setup();
    const item = dom.querySelectorAll('li')[1];
    expect(item.classList.toggle('hidden')).toBe(true);
    expect(item.class).toBe('item hidden');
    expect(item.classList.toggle('hidden')).toBe(false);
    expect(item.classList.contains('hidden')).toBe(false);
    expect(item.classList.toggle('item', true)).toBe(true);
    expect(item.classList.toggle('extra', false)).toBe(false);
    expect(item.class).toBe('item');
  });
});

test.describe('dataset', () => {
  test('should read data attributes in camel case', () => {
    const { dom } = setup();
    const item = dom.querySelector('li');
    expect(item.dataset.kind).toBe('fruit');
    expect(item.dataset.get('kind')).toBe('fruit');
    expect(item.dataset.missing).toBe(undefined);
    expect(item.dataset.get('missing')).toBe(null);
    expect('kind' in item.dataset).toBe(true);
  });

  test('should write data attributes in kebab case', () => {
    const { dom } = setup();
    const item = dom.querySelector('li');
    item.dataset.set('userId', 42);
    item.dataset.newThing = 'v';
    expect(item.getAttribute('data-user-id')).toBe('42');
    expect(item.getAttribute('data-new-thing')).toBe('v');
    expect(item.dataset.userId).toBe('42');
    expect(Object.keys(item.dataset)).toEqual(['kind', 'userId', 'newThing']);
    expect(JSON.stringify(item.dataset)).toBe('{"kind":"fruit","userId":"42","newThing":"v"}');
  });

  test('should see attributes set directly', () => {
    const { dom } = setup();
    const item = dom.querySelector('li');
    item.setAttribute('data-kind', 'berry');
    expect(item.dataset.kind).toBe('berry');
  });
});

test.describe('missing element', () => {
  test('should return safe defaults', () => {
    const { dom } = setup();
    const missing = dom.querySelector('#missing');
    expect(missing.isNull()).toBe(true);
    expect(missing.tag).toBe('');
    expect(missing.id).toBe('');
    expect(missing.textContent()).toBe('');
    expect(missing.getAttribute('id')).toBe(null);
    expect(missing.classList.contains('a')).toBe(false);
    expect(missing.classList.length()).toBe(0);
    expect(missing.dataset.get('x')).toBe(null);
    expect(missing.querySelectorAll('li')).toEqual([]);
  });

  test('should absorb writes', () => {
    const { dom, elements } = setup();
    const missing = dom.querySelector('#missing');
    missing.setAttribute('class', 'ghost');
    missing.classList.add('other');
    expect(missing.class).toBe('ghost other');
    expect(dom.querySelector('#missing').class).toBe('');
    expect(elements.some(element => element.class === 'ghost other')).toBe(false);
  });
});
