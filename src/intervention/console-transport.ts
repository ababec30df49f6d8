import readline from "readline";
import { raceAbort } from "../abort.js";
import { getHelpText, parseInterventionCommand } from "../cli/parser.js";
import type { InterventionContext, InterventionResponse, InterventionTransport } from "./types.js";

const PROMPT = "intervention> ";

export interface ConsoleTransportOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function formatInterventionContext(context: InterventionContext): string {
  const lines = [
    "",
    "=".repeat(60),
    "HUMAN INTERVENTION REQUIRED",
    "=".repeat(60),
    `Step ${context.stepNumber}: ${context.stepTitle}`,
    `Error: ${context.errorMessage}`,
    `Retries so far: ${context.retryCount}`,
  ];
  if (context.pageUrl) lines.push(`Page: ${context.pageUrl}`);
  if (context.screenshotPath) lines.push(`Screenshot: ${context.screenshotPath}`);
  lines.push("=".repeat(60), "");
  return lines.join("\n");
}

/**
 * Line protocol on a terminal. Input that is not a complete command prints a
 * hint and asks again; the gateway's deadline covers every prompt.
 */
export class ConsoleTransport implements InterventionTransport {
  readonly name = "console";
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;

  constructor(opts: ConsoleTransportOptions = {}) {
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
  }

  async request(context: InterventionContext, signal: AbortSignal): Promise<InterventionResponse> {
    const rl = readline.createInterface({ input: this.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    try {
      this.output.write(formatInterventionContext(context));
      this.output.write(`${getHelpText()}\n`);

      for (;;) {
        this.output.write(PROMPT);
        const next = await raceAbort(lines.next(), signal);
        if (next.done) {
          throw new Error("Console input closed before a command was entered");
        }

        const command = parseInterventionCommand(next.value);
        switch (command.type) {
          case "respond":
            return command.response;
          case "help":
            this.output.write(`${getHelpText()}\n`);
            break;
          case "invalid":
            this.output.write(`${command.reason}\n`);
            break;
        }
      }
    } finally {
      rl.close();
    }
  }
}
