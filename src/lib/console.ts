import chalk from "chalk";

export type Write = (line: string) => void;

export type ConsoleOutput = {
  startPanel(appName: string): void;
  configTable(rows: Array<[string, string]>): void;
  stepPanel(step: string, title: string): void;
  line(text: string): void;
};

const stdout: Write = (line) => {
  process.stdout.write(`${line}\n`);
};

export function createConsoleOutput(write: Write = stdout): ConsoleOutput {
  return {
    startPanel(appName) {
      const title = ` ${appName} `;
      const rule = "─".repeat(Math.max(title.length, 40));
      write(chalk.blue(rule));
      write(chalk.blue.bold(title));
      write(chalk.gray(` started ${new Date().toISOString()}`));
      write(chalk.blue(rule));
    },

    configTable(rows) {
      const width = Math.max(...rows.map(([k]) => k.length));
      write(chalk.bold("\nConfiguration"));
      for (const [key, value] of rows) {
        write(`  ${chalk.cyan(key.padEnd(width))}  ${value}`);
      }
      write("");
    },

    stepPanel(step, title) {
      write("");
      write(chalk.magenta.bold(`[${step}] ${title}`));
      write(chalk.magenta("─".repeat(step.length + title.length + 3)));
    },

    line(text) {
      write(text);
    },
  };
}
