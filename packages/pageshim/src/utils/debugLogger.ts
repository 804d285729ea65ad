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

import debug from 'debug';
import * as fs from 'fs';

import { getFromENV } from './env';

const debugLoggerColorMap = {
  'runtime': 45, // cyan
  'scheduler': 34, // green
  'cssom': 33, // blue
  'console': 0, // reset
  'error': 160, // red
};
export type LogName = keyof typeof debugLoggerColorMap;

const ansiRegex = new RegExp([
  '[\\u001B\\u009B][[\\]()#;?]*(?:(?:(?:[a-zA-Z\\d]*(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]*)*)?\\u0007)',
  '(?:(?:\\d{1,4}(?:;\\d{0,4})*)?[\\dA-PR-TZcf-ntqry=><~]))'
].join('|'), 'g');

export class DebugLogger {
  private _debuggers = new Map<string, debug.Debugger>();

  // Redirects all `debug` output to |logFile| with colors stripped.
  constructor(logFile = getFromENV('DEBUG_FILE')) {
    if (logFile) {
      const stream = fs.createWriteStream(logFile);
      debug.log = (data: string) => {
        stream.write(data.replace(ansiRegex, ''));
        stream.write('\n');
      };
    }
  }

  log(name: LogName, message: string | Error | object) {
    let cachedDebugger = this._debuggers.get(name);
    if (!cachedDebugger) {
      cachedDebugger = debug(`pageshim:${name}`);
      this._debuggers.set(name, cachedDebugger);
      cachedDebugger.color = String(debugLoggerColorMap[name]);
    }
    cachedDebugger(message);
  }
}

export const debugLogger = new DebugLogger();
