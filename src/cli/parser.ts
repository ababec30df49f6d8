import type { InterventionResponse } from "../intervention/types.js";

export type InterventionCommand =
  | { type: "respond"; response: InterventionResponse }
  | { type: "help" }
  | { type: "invalid"; reason: string };

function unquote(arg: string): string {
  return arg.trim().replace(/^["']+|["']+$/g, "").trim();
}

/**
 * Parse one line typed at the intervention prompt. Anything that is not a
 * complete command comes back as "help" or "invalid" so the caller can
 * prompt again.
 */
export function parseInterventionCommand(input: string): InterventionCommand {
  const trimmed = input.trim();
  if (!trimmed) {
    return { type: "invalid", reason: "Empty command" };
  }

  const match = trimmed.match(/^(\S+)(?:\s+([\s\S]*))?$/);
  const cmd = (match?.[1] ?? trimmed).toLowerCase();
  const arg = match?.[2] !== undefined ? unquote(match[2]) : "";

  switch (cmd) {
    case "continue":
      return { type: "respond", response: { action: "continue" } };

    case "skip":
      return { type: "respond", response: { action: "skip" } };

    case "retry":
      return { type: "respond", response: { action: "retry" } };

    case "status":
      return { type: "respond", response: { action: "status" } };

    case "hint":
      if (!arg) {
        return {
          type: "invalid",
          reason: 'Provide guidance text, e.g. hint "Click the settings button in the top right"',
        };
      }
      return { type: "respond", response: { action: "continue", additionalInstructions: arg } };

    case "modify":
      if (!arg) {
        return {
          type: "invalid",
          reason: 'Provide the new instruction, e.g. modify "Open the menu in the left sidebar"',
        };
      }
      return { type: "respond", response: { action: "modify", message: arg } };

    case "goto":
      if (!/^\d+$/.test(arg)) {
        return { type: "invalid", reason: "Provide a valid step number, e.g. goto 3" };
      }
      return { type: "respond", response: { action: "goto", targetStep: parseInt(arg, 10) } };

    case "help":
      return { type: "help" };

    default:
      return { type: "invalid", reason: `Unknown command "${cmd}" (type help for the list)` };
  }
}

export function getHelpText(): string {
  return [
    "Commands:",
    "  continue           Retry the current step",
    "  skip               Skip the current step and move on",
    "  retry              Move past the current step without retrying it",
    '  hint "<text>"      Retry the step with extra guidance for the agent',
    '  modify "<text>"    Replace the step\'s actions with a new instruction',
    "  status             Move past the current step",
    "  goto <n>           Jump to step n",
    "  help               Show this help text",
  ].join("\n");
}
