import { z } from "zod";
import type { InterventionContext, InterventionResponse, InterventionTransport } from "./types.js";

const ResponseSchema = z.object({
  action: z.enum(["continue", "skip", "retry", "modify", "goto", "status", "unknown"]),
  message: z.string().optional(),
  additionalInstructions: z.string().optional(),
  targetStep: z.coerce.number().int().optional(),
});

/**
 * Validates a response from a remote operator. Anything without a
 * recognisable action resolves to `continue`.
 */
export function parseRemoteResponse(data: unknown): InterventionResponse {
  const parsed = ResponseSchema.safeParse(data);
  if (!parsed.success) {
    return { action: "continue", message: "Unrecognised intervention response, continuing" };
  }
  return parsed.data;
}

export type InterventionCallback = (
  context: InterventionContext,
  signal: AbortSignal,
) => Promise<unknown>;

/** Hands the context to a remote party and waits for its answer. */
export class CallbackTransport implements InterventionTransport {
  readonly name: string;
  private callback: InterventionCallback;

  constructor(callback: InterventionCallback, name = "callback") {
    this.callback = callback;
    this.name = name;
  }

  async request(context: InterventionContext, signal: AbortSignal): Promise<InterventionResponse> {
    const raw = await this.callback(context, signal);
    return parseRemoteResponse(raw);
  }
}
