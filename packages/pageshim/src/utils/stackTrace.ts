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

import * as path from 'path';
import * as url from 'url';
import StackUtils from 'stack-utils';

const stackUtils = new StackUtils({ internals: StackUtils.nodeInternals() });

const CORE_DIR = path.resolve(__dirname, '..');

const internalStackPrefixes = [
  CORE_DIR,
];

export type RawStack = string[];

export type StackFrame = {
  file: string;
  line: number;
  column: number;
  function?: string;
};

export function captureRawStack(): RawStack {
  const stackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 50;
  const error = new Error();
  const stack = error.stack || '';
  Error.stackTraceLimit = stackTraceLimit;
  return stack.split('\n');
}

export function parseStackTraceLine(line: string): StackFrame | null {
  const frame = stackUtils.parseLine(line);
  if (!frame || !frame.file)
    return null;
  if (frame.file.startsWith('internal') || frame.file.startsWith('node:'))
    return null;
  // ESM files return file:// URLs.
  const file = frame.file.startsWith('file://') ? url.fileURLToPath(frame.file) : frame.file;
  return {
    file,
    line: frame.line || 0,
    column: frame.column || 0,
    function: frame.function,
  };
}

function isInternalFrame(frame: StackFrame): boolean {
  // stack-utils reports files under the working directory relative to it.
  const file = path.resolve(process.cwd(), frame.file);
  return internalStackPrefixes.some(prefix => file.startsWith(prefix));
}

/**
 * Returns the first frame of |stack| that does not belong to this library,
 * i.e. the location of the script that called into it.
 */
export function firstExternalFrame(stack: string | RawStack): StackFrame | undefined {
  const lines = typeof stack === 'string' ? stack.split('\n') : stack;
  for (const line of lines) {
    const frame = parseStackTraceLine(line);
    if (frame && !isInternalFrame(frame))
      return frame;
  }
}
