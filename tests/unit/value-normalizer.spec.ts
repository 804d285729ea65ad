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
import { normalizeColor, normalizeUnit } from '../../packages/pageshim/src/valueNormalizer';

test.describe('normalizeColor', () => {
  test('expands short hex', () => {
    expect(normalizeColor('#abc')).toBe('#aabbcc');
    expect(normalizeColor('#ABC')).toBe('#aabbcc');
  });

  test('keeps long hex lower-cased', () => {
    expect(normalizeColor('#00FF7f')).toBe('#00ff7f');
  });

  test('converts opaque rgb to hex', () => {
    expect(normalizeColor('rgb(0,0,0)')).toBe('#000000');
    expect(normalizeColor(' RGB(255, 0, 0) ')).toBe('#ff0000');
    expect(normalizeColor('rgba(10, 20, 30, 1)')).toBe('#0a141e');
  });

  test('keeps translucent rgba', () => {
    expect(normalizeColor('rgba(10,20,30,0.5)')).toBe('rgba(10,20,30,0.5)');
    expect(normalizeColor('rgba(0, 0, 255, 0.25)')).toBe('rgba(0,0,255,0.25)');
  });

  test('treats an unparsable alpha as opaque', () => {
    expect(normalizeColor('rgba(0, 0, 255, x)')).toBe('#0000ff');
  });

  test('wraps out of range channels into a byte', () => {
    expect(normalizeColor('rgb(256, 0, 0)')).toBe('#000000');
  });

  test('converts hsl', () => {
    expect(normalizeColor('hsl(0,100%,50%)')).toBe('#ff0000');
    expect(normalizeColor('hsl(120, 100%, 50%)')).toBe('#00ff00');
    expect(normalizeColor('hsla(0, 0%, 50%, 0.25)')).toBe('rgba(128,128,128,0.25)');
  });

  test('maps known names', () => {
    expect(normalizeColor('Blue')).toBe('#0000ff');
    expect(normalizeColor('green')).toBe('#008000');
  });

  test('passes unknown values through', () => {
    expect(normalizeColor('rebeccapurple')).toBe('rebeccapurple');
    expect(normalizeColor(' Transparent ')).toBe('transparent');
  });
});

test.describe('normalizeUnit', () => {
  test('adds px to bare numbers', () => {
    expect(normalizeUnit('12')).toBe('12px');
    expect(normalizeUnit(' 1.5 ')).toBe('1.5px');
  });

  test('strips whitespace and lower-cases', () => {
    expect(normalizeUnit('12 PX')).toBe('12px');
    expect(normalizeUnit(' 1.5 EM ')).toBe('1.5em');
  });

  test('leaves other units alone', () => {
    expect(normalizeUnit('50%')).toBe('50%');
    expect(normalizeUnit('auto')).toBe('auto');
  });
});
