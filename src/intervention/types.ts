export type InterventionAction =
  | "continue"
  | "skip"
  | "retry"
  | "modify"
  | "goto"
  | "status"
  | "unknown";

/** Snapshot of the failure an operator is asked to resolve. */
export interface InterventionContext {
  readonly stepNumber: number;
  readonly stepTitle: string;
  readonly errorMessage: string;
  readonly screenshotPath?: string;
  readonly pageUrl?: string;
  readonly retryCount: number;
}

export interface InterventionResponse {
  action: InterventionAction;
  message?: string;
  additionalInstructions?: string;
  /** Required when `action` is "goto". */
  targetStep?: number;
}

/**
 * One way of reaching an operator. The gateway owns the deadline: a
 * transport should stop waiting once `signal` aborts.
 */
export interface InterventionTransport {
  readonly name: string;
  request(context: InterventionContext, signal: AbortSignal): Promise<InterventionResponse>;
}

export interface InterventionRecord {
  readonly timestamp: string;
  readonly stepNumber: number;
  readonly stepTitle: string;
  readonly errorMessage: string;
  readonly retryCount: number;
  readonly transport: string;
  readonly response: {
    readonly action: InterventionAction | "timeout" | "error";
    readonly message?: string;
    readonly additionalInstructions?: string;
    readonly targetStep?: number;
  };
  /** True when the response is the gateway's fallback rather than an operator's. */
  readonly fallback: boolean;
}
