//NOTE(self): Terminal UI Module
//NOTE(self): Plain line-oriented output for the plan scripts — no cursor control, safe to pipe.

//NOTE(self): Ansi Escape Codes
export const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

export type AnsiColor = keyof typeof ANSI;

//NOTE(self): Symbols
export const SYM = {
  bullet: '•',
  ring: '○',
  arrowRight: '▸',
  check: '✓',
  cross: '✗',
  warning: '⚠',
};

export const BOX = {
  horizontal: '─',
  dHorizontal: '═',
};

//NOTE(self): Color is off when stdout is not a terminal or NO_COLOR is set
let colorEnabled = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

export function paint(color: AnsiColor, text: string): string {
  return colorEnabled ? `${ANSI[color]}${text}${ANSI.reset}` : text;
}

export function getTerminalWidth(): number {
  return Math.min(process.stdout.columns || 80, 100);
}

export function rule(char: string = BOX.horizontal): string {
  return char.repeat(getTerminalWidth());
}

export class TerminalUI {
  private write(text: string): void {
    process.stdout.write(text + '\n');
  }

  private log(icon: string, color: AnsiColor, message: string, detail?: string): void {
    const det = detail ? `  ${paint('dim', detail)}` : '';
    this.write(`${paint(color, icon)} ${message}${det}`);
  }

  line(text: string = ''): void {
    this.write(text);
  }

  header(title: string): void {
    this.write('');
    this.write(paint('bold', title));
    this.write(paint('gray', rule(BOX.dHorizontal)));
  }

  info(message: string, detail?: string): void {
    this.log(SYM.ring, 'white', message, detail);
  }

  success(message: string, detail?: string): void {
    this.log(SYM.check, 'green', message, detail);
  }

  warn(message: string, detail?: string): void {
    this.log(SYM.warning, 'yellow', message, detail);
  }

  error(message: string, detail?: string): void {
    this.log(SYM.cross, 'red', message, detail);
  }

  bullet(message: string): void {
    this.write(`  ${SYM.bullet} ${message}`);
  }
}

export const ui = new TerminalUI();
