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

export function toKebabCase(name: string): string {
  // E.g. pageTitle => page-title.
  return name.replace(/[A-Z]/g, c => '-' + c.toLowerCase());
}

export function toCamelCase(name: string): string {
  // E.g. page-title => pageTitle.
  return name.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

export function splitTokens(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}
