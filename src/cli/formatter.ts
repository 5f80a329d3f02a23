import { Chalk } from "chalk";
import type { Task, TaskSummary } from "../lib/types.ts";

const WIDTH = 50;
const BAR_LENGTH = 30;
const LABEL_WIDTH = 18;

export const MENU_OPTIONS = [
  "Add Task",
  "View All Tasks",
  "Update Task",
  "Delete Task",
  "Mark Task Complete/Incomplete",
  "View Task Summary",
  "Exit",
] as const;

export interface Formatter {
  banner(): string;
  goodbye(): string;
  menu(): string;
  heading(text: string): string;
  success(message: string): string;
  error(message: string): string;
  info(message: string): string;
  task(task: Task): string;
  taskList(tasks: Task[], headline: string): string;
  summary(summary: TaskSummary): string;
}

export function createFormatter(opts: { color: boolean }): Formatter {
  const c = opts.color ? new Chalk() : new Chalk({ level: 0 });
  const rule = c.cyan("=".repeat(WIDTH));
  const thinRule = c.gray("─".repeat(WIDTH));

  function row(label: string, value: string): string {
    return `${label.padEnd(LABEL_WIDTH)}${value}`;
  }

  function task(t: Task): string {
    const status = t.completed
      ? c.green("✓ Complete")
      : c.yellow("○ Incomplete");
    return [
      c.blue.bold(`Task #${t.id}`),
      thinRule,
      `Title: ${c.magenta(t.title)}`,
      `Description: ${c.gray(t.description || "(none)")}`,
      `Status: ${status}`,
    ].join("\n");
  }

  return {
    banner() {
      return ["", rule, c.cyan.bold("WELCOME TO TODO APP"), rule].join("\n");
    },

    goodbye() {
      return `\n${c.green.bold("Thank you for using Todo App! Goodbye!")}`;
    },

    menu() {
      const options = MENU_OPTIONS.map((label, i) => `${i + 1}. ${label}`);
      return ["", rule, c.cyan.bold("TODO APP - MAIN MENU"), rule, ...options, rule].join(
        "\n",
      );
    },

    heading(text) {
      return `\n${c.blue.bold(`--- ${text} ---`)}`;
    },

    success(message) {
      return `\n${c.green(`✓ ${message}`)}`;
    },

    error(message) {
      return `\n${c.red(`✗ Error: ${message}`)}`;
    },

    info(message) {
      return c.blue(`ℹ ${message}`);
    },

    task,

    taskList(tasks, headline) {
      if (tasks.length === 0) return `\n${c.yellow(headline)}`;
      const blocks = tasks.map((t) => `\n${task(t)}`);
      return ["", rule, c.bold(headline), rule, ...blocks].join("\n");
    },

    summary(summary) {
      const lines = [
        "",
        c.blue.bold("TASK SUMMARY"),
        rule,
        row("Total Tasks:", c.cyan(String(summary.total))),
        row("Completed:", c.green(String(summary.complete))),
        row("Incomplete:", c.yellow(String(summary.incomplete))),
      ];

      if (summary.total > 0) {
        const filled = Math.floor((summary.complete * BAR_LENGTH) / summary.total);
        const percent = Math.round((summary.complete * 100) / summary.total);
        const bar = "█".repeat(filled) + "░".repeat(BAR_LENGTH - filled);
        lines.push(row("Progress:", `${c.green(bar)} ${percent}%`));
      }

      lines.push(rule);
      return lines.join("\n");
    },
  };
}
