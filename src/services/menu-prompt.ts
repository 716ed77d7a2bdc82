import readline from 'readline';
import { MENU_CHROME_WIDTH } from '../config/constants';

export type MenuItem = {
  key: string;
  label: string;
};

export type MenuRequest = {
  title: string;
  message: string;
  width: number;
  items: MenuItem[];
};

/**
 * Single-select list. Resolves with the chosen key, `''` when nothing was
 * chosen, or `null` when the user cancelled.
 */
export interface MenuPrompt {
  select(request: MenuRequest): Promise<string | null>;
}

/**
 * Maps a typed answer (1-based index or the key itself) to a key.
 */
export function parseMenuAnswer(answer: string, items: MenuItem[]): string {
  const trimmed = answer.trim();
  if (!trimmed) return '';
  if (/^\d+$/.test(trimmed)) {
    const item = items[Number(trimmed) - 1];
    return item ? item.key : '';
  }
  return items.find((item) => item.key === trimmed)?.key ?? '';
}

export function renderMenu(request: MenuRequest): string {
  const rule = '-'.repeat(request.width + MENU_CHROME_WIDTH);
  const keyWidth = Math.max(...request.items.map((item) => item.key.length));
  const rows = request.items.map(
    (item, idx) => ` ${String(idx + 1).padStart(2)}) ${item.key.padEnd(keyWidth)} ${item.label}`
  );
  return [rule, ` ${request.title}`, rule, request.message, '', ...rows, rule].join('\n');
}

function isTerminal(stream: NodeJS.ReadableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Terminal list on stderr; input from stdin. On a TTY Ctrl-C cancels; end of
 * input or an aborted `signal` cancels as well.
 */
export class TerminalMenuPrompt implements MenuPrompt {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr,
    private readonly signal?: AbortSignal
  ) {}

  select(request: MenuRequest): Promise<string | null> {
    if (this.signal?.aborted) return Promise.resolve(null);

    return new Promise((resolve) => {
      // readline only turns Ctrl-C into 'SIGINT' in terminal mode.
      const rl = readline.createInterface({
        input: this.input,
        output: this.output,
        terminal: isTerminal(this.input),
      });
      let settled = false;
      const onAbort = () => finish(null);
      const finish = (value: string | null) => {
        if (settled) return;
        settled = true;
        this.signal?.removeEventListener('abort', onAbort);
        rl.close();
        resolve(value);
      };

      this.signal?.addEventListener('abort', onAbort);
      rl.on('SIGINT', () => finish(null));
      rl.on('close', () => finish(null));

      this.output.write(`${renderMenu(request)}\n`);
      rl.question(`Select [1-${request.items.length}]: `, (answer) => {
        finish(parseMenuAnswer(answer, request.items));
      });
    });
  }
}
