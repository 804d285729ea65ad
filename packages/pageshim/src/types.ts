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

export type AttributeEntry = [name: string, value: string];

/**
 * One node of the flattened element list produced by the page loader.
 * Tree structure is carried by |parent|, an index into the same list.
 */
export type ElementRecord = {
  tag: string;
  id?: string;
  class?: string;
  parent?: number | null;
  attributes: AttributeEntry[];
  text?: string;
};

export type StyleDeclarations = Map<string, string>;

export type StyleRule = {
  readonly selector: string;
  readonly declarations: StyleDeclarations;
  readonly specificity: number;
  readonly order: number;
};

export interface ComputedStyle {
  getPropertyValue(property: string): string;
}

export type ConsoleMessageLevel = 'log' | 'error';

export type ConsoleMessage = {
  level: ConsoleMessageLevel;
  text: string;
  source?: string;
  line?: number;
  column?: number;
  stack?: string;
};

export type ConsoleChannel = (message: ConsoleMessage) => void;

export type ScriptResult = {
  value: string;
  isError: boolean;
};

export type PageSnapshot = {
  elements: ElementRecord[];
  styles?: string[];
  title?: string;
  body?: string;
};
