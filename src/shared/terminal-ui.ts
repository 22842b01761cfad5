/**
 * Terminal UI utilities with ASCII art and formatting
 */

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
} as const;

export const PALMTALK_LOGO = `
${colors.brightCyan}  ___  _   _    __  __ _____ _   _    _  __
 | _ \\/_\\ | |  |  \\/  |_   _/_\\ | |  | |/ /
 |  _/ _ \\| |__| |\\/| | | |/ _ \\| |__| ' <
 |_|/_/ \\_\\____|_|  |_| |_/_/ \\_\\____|_|\\_\\${colors.reset}
`;

// Box drawing characters
export const box = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
} as const;

/**
 * Create a styled box with content
 */
export function createBox(content: string[], width: number = 60, title?: string): string {
  const lines: string[] = [];

  if (title) {
    const titlePadding = Math.max(0, width - title.length - 4);
    const leftPad = Math.floor(titlePadding / 2);
    const rightPad = titlePadding - leftPad;
    lines.push(`${box.topLeft}${box.horizontal.repeat(leftPad + 1)} ${colors.bright}${title}${colors.reset} ${box.horizontal.repeat(rightPad + 1)}${box.topRight}`);
  } else {
    lines.push(`${box.topLeft}${box.horizontal.repeat(width)}${box.topRight}`);
  }

  content.forEach(line => {
    const padding = Math.max(1, width - line.length);
    lines.push(`${box.vertical} ${line}${' '.repeat(padding - 1)} ${box.vertical}`);
  });

  lines.push(`${box.bottomLeft}${box.horizontal.repeat(width)}${box.bottomRight}`);

  return lines.join('\n');
}

/**
 * Startup banner for an entry point
 */
export function createStartupBanner(mode: string, model: string, details: string[] = []): string {
  const lines = [
    '',
    PALMTALK_LOGO,
    '',
    `${colors.brightGreen}    🎙️  Mode: ${colors.bright}${mode}${colors.reset}`,
    `${colors.brightBlue}    🤖 Model: ${colors.bright}${model}${colors.reset}`,
    ...details.map(d => `${colors.brightYellow}    ${d}${colors.reset}`),
    '',
  ];
  return lines.join('\n');
}

export function createGestureLegend(cooldownMs: number): string {
  return createBox([
    '✋ Open Palm    Start listening',
    '✊ Closed Fist  Stop listening',
    '✌️  Victory      Reset history',
    '',
    `Cooldown between gestures: ${(cooldownMs / 1000).toFixed(1)}s`,
  ], 44, 'GESTURES');
}

/**
 * Create CLI help display
 */
export function createHelpDisplay(): string {
  return `
${colors.brightCyan}╭──────────────────────────────────────────────────────╮
│                                                      │
│  ${colors.bright}PALMTALK${colors.reset}${colors.brightCyan} - Command Line Interface                │
│                                                      │
╰──────────────────────────────────────────────────────╯${colors.reset}

${colors.bright}USAGE:${colors.reset}
  ${colors.brightGreen}palmtalk${colors.reset} ${colors.gray}<command>${colors.reset} ${colors.dim}[flags]${colors.reset}

${colors.bright}COMMANDS:${colors.reset}
  ${colors.brightGreen}gesture${colors.reset}    Drive the assistant with hand gestures + microphone
  ${colors.brightGreen}headless${colors.reset}   Listen for the wake word and run spoken commands
  ${colors.brightGreen}panel${colors.reset}      Serve the HTTP/WebSocket control panel
  ${colors.brightGreen}send${colors.reset}       Send a typed command to a running panel
  ${colors.brightGreen}help${colors.reset}       Show this help

${colors.bright}FLAGS:${colors.reset}
  ${colors.brightYellow}--port, -p${colors.reset} ${colors.gray}<n>${colors.reset}        Panel port ${colors.dim}(default: 3000 or $PORT)${colors.reset}
  ${colors.brightYellow}--cooldown${colors.reset} ${colors.gray}<ms>${colors.reset}       Gesture cooldown ${colors.dim}(default: 2000)${colors.reset}
  ${colors.brightYellow}--fast-path${colors.reset} ${colors.gray}<mode>${colors.reset}    short-circuit | annotate
  ${colors.brightYellow}--wake-word${colors.reset} ${colors.gray}<words>${colors.reset}   Comma-separated wake words
  ${colors.brightYellow}--log-level${colors.reset} ${colors.gray}<level>${colors.reset}   DEBUG | INFO | WARN | ERROR
  ${colors.brightYellow}--help, -h${colors.reset}              Show this help

${colors.bright}EXAMPLES:${colors.reset}
  ${colors.gray}$${colors.reset} ${colors.brightGreen}palmtalk gesture${colors.reset} ${colors.brightYellow}--cooldown${colors.reset} ${colors.gray}1500${colors.reset}
  ${colors.gray}$${colors.reset} ${colors.brightGreen}palmtalk headless${colors.reset} ${colors.brightYellow}--wake-word${colors.reset} ${colors.gray}"computer,hey computer"${colors.reset}
  ${colors.gray}$${colors.reset} ${colors.brightGreen}palmtalk panel${colors.reset} ${colors.brightYellow}-p=3010${colors.reset}
  ${colors.gray}$${colors.reset} ${colors.brightGreen}palmtalk send${colors.reset} ${colors.gray}"open the calculator"${colors.reset}
`;
}

export function createShutdownBanner(): string {
  return `
${colors.brightYellow}╭──────────────────────────────────────────╮
│                                          │
│  ${colors.bright}📛 PALMTALK SHUTTING DOWN${colors.reset}${colors.brightYellow}               │
│                                          │
╰──────────────────────────────────────────╯${colors.reset}

${colors.gray}Cancelling the current task...${colors.reset}
`;
}

/**
 * Status message formatters
 */
export const status = {
  panelReady: (port: number) =>
    `${colors.brightGreen}🚀 Panel listening on ${colors.bright}http://localhost:${port}${colors.reset} ${colors.gray}(ws://localhost:${port}/ws)${colors.reset}`,

  missingApiKey: () =>
    `${colors.brightRed}❌ ANTHROPIC_API_KEY is not set; remote exchanges will fail.${colors.reset}`,

  unknownCommand: (cmd: string) =>
    `${colors.brightRed}❌ Unknown command: ${colors.bright}${cmd}${colors.reset}`,

  panelUnreachable: (url: string) =>
    `${colors.brightRed}❌ Could not reach the panel at ${colors.bright}${url}${colors.reset}`,
};

/**
 * Format log level with colors
 */
export function formatLogLevel(level: string): string {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return `${colors.gray}DEBUG${colors.reset}`;
    case 'INFO':
      return `${colors.brightBlue}INFO ${colors.reset}`;
    case 'WARN':
      return `${colors.brightYellow}WARN ${colors.reset}`;
    case 'ERROR':
      return `${colors.brightRed}ERROR${colors.reset}`;
    default:
      return level.padEnd(5);
  }
}

/**
 * Format category with colors
 */
export function formatCategory(category: string): string {
  const categoryColors: Record<string, string> = {
    'HTTP': colors.brightGreen,
    'WebSocket': colors.brightCyan,
    'Trigger': colors.brightMagenta,
    'Agent': colors.brightYellow,
    'Scheduler': colors.brightBlue,
    'FastPath': colors.green,
    'History': colors.gray,
    'Speech': colors.cyan,
    'Config': colors.brightRed,
  };

  const color = categoryColors[category] || colors.white;
  return `${color}${category.padEnd(12)}${colors.reset}`;
}
