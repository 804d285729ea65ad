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

import { debugLogger } from './utils/debugLogger';
import { captureRawStack, firstExternalFrame } from './utils/stackTrace';

import type { ConsoleChannel, ConsoleMessage, ConsoleMessageLevel } from './types';

export type ScriptConsole = {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export class ConsoleSink {
  private _channel: ConsoleChannel | undefined;
  private _buffer: string[] = [];

  constructor(channel?: ConsoleChannel) {
    this._channel = channel;
  }

  setChannel(channel: ConsoleChannel | undefined) {
    this._channel = channel;
  }

  log(...args: unknown[]) {
    this.report('log', formatArgs(args));
  }

  error(...args: unknown[]) {
    this.report('error', formatArgs(args));
  }

  report(level: ConsoleMessageLevel, text: string, stack?: string) {
    debugLogger.log('console', `[${level}] ${text}`);
    if (!this._channel) {
      this._buffer.push(text);
      return;
    }
    const messageStack = stack ?? captureRawStack().join('\n');
    const message: ConsoleMessage = { level, text, stack: messageStack };
    const frame = firstExternalFrame(messageStack);
    if (frame) {
      message.source = frame.file;
      message.line = frame.line;
      message.column = frame.column;
    }
    try {
      this._channel(message);
    } catch (e) {
      debugLogger.log('error', e instanceof Error ? e : String(e));
    }
  }

  buffered(): readonly string[] {
    return this._buffer;
  }

  takeBuffered(): string[] {
    const buffer = this._buffer;
    this._buffer = [];
    return buffer;
  }

  api(): ScriptConsole {
    return {
      log: (...args: unknown[]) => this.log(...args),
      error: (...args: unknown[]) => this.error(...args),
    };
  }
}

export function formatArgs(args: unknown[]): string {
  return args.map(arg => String(arg)).join(' ');
}
