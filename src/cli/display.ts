import chalk from "chalk";
import type { StepStatus } from "../output-sink.js";

export function banner(): void {
  console.log(chalk.bold.cyan("\n  STEPWISE QA"));
  console.log(chalk.dim("  Plan runner with retries and human intervention\n"));
}

export function info(msg: string): void {
  console.log(chalk.blue(`[info] ${msg}`));
}

export function success(msg: string): void {
  console.log(chalk.green(`[ok] ${msg}`));
}

export function warn(msg: string): void {
  console.log(chalk.yellow(`[warn] ${msg}`));
}

export function error(msg: string): void {
  console.log(chalk.red(`[error] ${msg}`));
}

export function agentMessage(msg: string): void {
  console.log(chalk.white(`\n${msg}\n`));
}

export function testStep(
  stepNumber: number,
  total: number,
  title: string,
  status: StepStatus,
): void {
  const icons: Record<StepStatus, string> = {
    running: chalk.blue("..."),
    pass: chalk.green("PASS"),
    fail: chalk.red("FAIL"),
    retry: chalk.yellow("RETRY"),
    skip: chalk.dim("SKIP"),
  };
  console.log(`  [${stepNumber}/${total}] ${icons[status]} ${title}`);
}

export function runVerdict(passed: number, failed: number, success: boolean): void {
  const fn = success ? chalk.green.bold : chalk.red.bold;
  console.log(fn(`\n  VERDICT: ${success ? "PASS" : "FAIL"}`));
  console.log(`  ${chalk.green(`${passed} passed`)}  ${chalk.red(`${failed} failed`)} attempts`);
}

export function separator(): void {
  console.log(chalk.dim("─".repeat(60)));
}
