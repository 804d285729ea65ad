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

class CustomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ScriptTimeoutError extends CustomError {
  constructor(readonly timeout: number) {
    super(`Script timed out after ${timeout}ms`);
  }
}

// Values thrown inside a vm context come from a different realm and fail
// |instanceof Error|, so errors are recognized by shape.
export function isError(obj: unknown): obj is Error {
  if (obj instanceof Error)
    return true;
  return typeof obj === 'object' && obj !== null && typeof Reflect.get(obj, 'message') === 'string' && typeof Reflect.get(obj, 'name') === 'string';
}

export function errorMessage(obj: unknown): string {
  if (isError(obj))
    return obj.message;
  return String(obj);
}

export function errorStack(obj: unknown): string | undefined {
  if (isError(obj))
    return obj.stack;
}
