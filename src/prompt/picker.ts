import * as readline from 'readline';

export class InputCancelled extends Error {
  constructor() {
    super('Input ended before a choice was made');
    this.name = 'InputCancelled';
  }
}

export interface PickOptions<T> {
  label?: (item: T) => string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const PROMPT = 'Pick one (leave blank for 1): ';

function parseChoice(answer: string, count: number): number | null {
  if (answer === '') return 0;
  if (!/^\s*[+-]?\d+\s*$/.test(answer)) return null;

  const index = Number(answer) - 1;
  return index >= 0 && index < count ? index : null;
}

/**
 * Ask the user to pick one of `choices` by number.
 *
 * A single choice is returned without prompting. Invalid answers re-prompt
 * without a message; end of input rejects with InputCancelled.
 */
export async function pickOne<T>(choices: readonly T[], options: PickOptions<T> = {}): Promise<T> {
  if (choices.length === 1) return choices[0];

  const label = options.label ?? ((item: T) => String(item));
  const output = options.output ?? process.stdout;

  choices.forEach((item, i) => {
    output.write(`${i + 1}) ${label(item)}\n`);
  });

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    terminal: false,
  });
  const lines = rl[Symbol.asyncIterator]();

  try {
    for (;;) {
      output.write(PROMPT);
      const next = await lines.next();
      if (next.done) {
        throw new InputCancelled();
      }

      const index = parseChoice(next.value, choices.length);
      if (index !== null) {
        return choices[index];
      }
    }
  } finally {
    rl.close();
  }
}
