export interface PageInspection {
  url: string;
  title: string;
  bodyTextLength: number;
}

/**
 * Opaque handle to the shared browser session. Only SessionManager closes it.
 */
export interface SessionHandle {
  readonly id: string;
  currentUrl(): string;
  inspectPage(): Promise<PageInspection>;
  captureScreenshot(filePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface SessionFactory {
  /** Start a session. The signal aborts when the start-up deadline passes. */
  create(signal: AbortSignal): Promise<SessionHandle>;
}

/** Host-level signals used while (re)creating sessions. */
export interface SystemProbe {
  memoryUsagePercent(): number;
  killStrayBrowsers(): Promise<void>;
}

export interface HealthReport {
  ok: boolean;
  status: string;
}

export type ReleaseOutcome = "closed" | "protected" | "absent";
