/**
 * Colored console logger with optional per-run sinks
 */
import { AsyncLocalStorage } from 'async_hooks';
import type { FillStats, PreviewEntry } from '../types/index.js';

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Background colors
  bgBlue: '\x1b[44m',
};

function timestamp(): string {
  return new Date().toLocaleTimeString();
}

function formatMessage(prefix: string, color: string, message: string): string {
  return `${colors.dim}[${timestamp()}]${colors.reset} ${color}${prefix}${colors.reset} ${message}`;
}

export type LogEntry = { level: string; message: string; timestamp: string };
type LogSink = (entry: LogEntry) => void;

const logSinks = new Map<string, LogSink>();
const logContext = new AsyncLocalStorage<{ runId: string }>();

export function stripAnsi(input: string): string {
  return input.replace(/\x1b\[[0-9;]*m/g, '');
}

function emit(level: string, formatted: string): void {
  const context = logContext.getStore();
  if (!context) return;
  const logSink = logSinks.get(context.runId);
  if (!logSink) return;
  const ts = timestamp();
  const lines = stripAnsi(formatted).split('\n');
  for (const line of lines) {
    const trimmed = line.trimEnd();
    if (trimmed.length === 0) continue;
    logSink({ level, message: trimmed, timestamp: ts });
  }
}

function print(level: string, formatted: string): void {
  console.log(formatted);
  emit(level, formatted);
}

function confidenceColor(confidence: number): string {
  return confidence >= 0.8 ? colors.green : confidence >= 0.5 ? colors.yellow : colors.red;
}

export const logger = {
  addLogSink(runId: string, sink: LogSink): void {
    logSinks.set(runId, sink);
  },

  removeLogSink(runId: string): void {
    logSinks.delete(runId);
  },

  withRunContext<T>(runId: string, fn: () => T): T {
    return logContext.run({ runId }, fn);
  },

  info(message: string): void {
    print('info', formatMessage('INFO', colors.blue, message));
  },

  success(message: string): void {
    print('success', formatMessage('SUCCESS', colors.green, message));
  },

  warn(message: string): void {
    print('warn', formatMessage('WARN', colors.yellow, message));
  },

  error(message: string): void {
    print('error', formatMessage('ERROR', colors.red, message));
  },

  debug(message: string): void {
    print('debug', formatMessage('DEBUG', colors.dim, message));
  },

  // Browser and injection actions
  action(message: string): void {
    print('action', formatMessage('BOT', colors.cyan + colors.bright, message));
  },

  // One line per matched field
  match(label: string, attribute: string, confidence: number, source: string): void {
    const shown = label.trim() || '(no label)';
    print(
      'match',
      formatMessage(
        'MATCH',
        colors.magenta,
        `"${shown}" -> ${colors.bright}${attribute}${colors.reset} ` +
          `${confidenceColor(confidence)}${confidence.toFixed(2)}${colors.reset} ${colors.dim}(${source})${colors.reset}`
      )
    );
  },

  preview(entries: readonly PreviewEntry[]): void {
    print('preview', `\n${colors.bgBlue}${colors.white}${colors.bright} FILL PREVIEW ${colors.reset}`);
    entries.forEach((entry, index) => {
      const position = `${index + 1}.`.padEnd(4);
      const label = (entry.label.trim() || '(no label)').slice(0, 40);
      if (entry.status === 'ready' && entry.value) {
        print(
          'preview',
          `  ${position}${label} -> ${colors.bright}${entry.attribute}${colors.reset}: ` +
            `${entry.value.value} ${confidenceColor(entry.confidence)}[${entry.confidence.toFixed(2)} ${entry.source}]${colors.reset}`
        );
      } else {
        const reason = entry.note ?? 'no match found';
        print('preview', `  ${position}${label} -> ${colors.red}UNMATCHED${colors.reset} ${colors.dim}${reason}${colors.reset}`);
      }
    });
    print('preview', '');
  },

  divider(title?: string): void {
    const line = '─'.repeat(50);
    if (title) {
      print('divider', `\n${colors.dim}${line}${colors.reset}`);
      print('divider', `${colors.bright}${colors.cyan}  ${title}${colors.reset}`);
      print('divider', `${colors.dim}${line}${colors.reset}\n`);
    } else {
      print('divider', `${colors.dim}${line}${colors.reset}`);
    }
  },

  summary(stats: FillStats): void {
    print('summary', `\n${colors.bgBlue}${colors.white}${colors.bright} SUMMARY ${colors.reset}`);
    print('summary', `${colors.cyan}  Fields detected:${colors.reset}      ${stats.detected}`);
    print('summary', `${colors.green}  Ready to fill:${colors.reset}        ${stats.ready}`);
    print('summary', `${colors.yellow}  Unmatched:${colors.reset}            ${stats.unmatched}`);
    if (stats.noValue > 0) {
      print('summary', `${colors.red}  Matched but no value:${colors.reset} ${stats.noValue}`);
    }
    print('summary', `${colors.cyan}  AI matcher calls:${colors.reset}     ${stats.aiCalls}`);
    print('summary', '');
  },

  banner(): void {
    print('banner', `
${colors.cyan}${colors.bright}
   ╔═══════════════════════════════════════════╗
   ║         Job Application Autofill          ║
   ║     Match • Preview • Fill, never submit  ║
   ╚═══════════════════════════════════════════╝
${colors.reset}`);
  },
};
