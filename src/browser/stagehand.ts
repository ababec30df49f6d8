import { spawn, ChildProcess } from "child_process";
import fs from "fs";
import path from "path";
import { Stagehand } from "@browserbasehq/stagehand";
import type { LogLine } from "@browserbasehq/stagehand";
import { throwIfAborted } from "../abort.js";
import type { AppConfig } from "../config/types.js";
import type { OutputSink } from "../output-sink.js";
import type { PageInspection, SessionFactory, SessionHandle } from "../session/types.js";

export function findPlaywrightChromium(): string {
  const cacheDir =
    process.env.PLAYWRIGHT_BROWSERS_PATH ??
    `${process.env.HOME}/.cache/ms-playwright`;
  const dirs = fs.existsSync(cacheDir)
    ? fs
        .readdirSync(cacheDir)
        .filter((d) => d.startsWith("chromium-"))
        .sort()
        .reverse()
    : [];
  for (const dir of dirs) {
    const candidate = path.join(cacheDir, dir, "chrome-linux64", "chrome");
    if (fs.existsSync(candidate)) return candidate;
  }
  throw new Error(
    "Playwright Chromium not found. Run: npx playwright install chromium",
  );
}

export function browserProfileDir(config: AppConfig): string {
  return path.resolve(config.dataDir, ".browser-profile");
}

function launchChrome(
  executablePath: string,
  config: AppConfig,
  profileDir: string,
): Promise<{ process: ChildProcess; wsUrl: string }> {
  return new Promise((resolve, reject) => {
    fs.mkdirSync(profileDir, { recursive: true });

    const args = [
      "--no-sandbox",
      "--disable-dev-shm-usage",
      "--remote-debugging-port=0",
      "--remote-allow-origins=*",
      "--no-first-run",
      "--no-default-browser-check",
      `--window-size=${config.viewport.width},${config.viewport.height + 87}`,
      `--user-data-dir=${profileDir}`,
      "--disable-blink-features=AutomationControlled",
      "--disable-infobars",
      "--disable-background-timer-throttling",
      "--disable-backgrounding-occluded-windows",
      "--disable-renderer-backgrounding",
    ];

    if (config.headless) {
      args.push("--headless=new");
    }

    const proc = spawn(executablePath, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, DISPLAY: process.env.DISPLAY || ":0" },
    });

    let stderr = "";
    const timeout = setTimeout(() => {
      reject(new Error(`Chrome launch timed out. stderr:\n${stderr}`));
      proc.kill();
    }, 15000);

    proc.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
      const match = stderr.match(/DevTools listening on (ws:\/\/\S+)/);
      if (match) {
        clearTimeout(timeout);
        resolve({ process: proc, wsUrl: match[1] });
      }
    });

    proc.on("error", (err) => {
      clearTimeout(timeout);
      reject(err);
    });

    proc.on("exit", (code) => {
      clearTimeout(timeout);
      if (!stderr.includes("DevTools listening on")) {
        reject(
          new Error(`Chrome exited with code ${code}. stderr:\n${stderr}`),
        );
      }
    });
  });
}

/**
 * Routes Stagehand's log lines into the sink: tool calls and reasoning are
 * shown, everything else is dropped.
 */
function buildStagehandLogger(sink: OutputSink): (line: LogLine) => void {
  let pendingStep = "";

  return (line) => {
    const msg = line.message;

    if (msg.includes("Executing step")) {
      const m = msg.match(/Executing step (\d+)\/(\d+)/);
      if (m) pendingStep = `${m[1]}/${m[2]}`;
      return;
    }

    if (msg.includes("Agent calling tool:")) {
      const tool = msg.replace(/.*Agent calling tool:\s*/, "");
      const aux = line.auxiliary;
      let detail = "";
      if (aux?.instruction?.value) {
        detail = ` → "${aux.instruction.value.slice(0, 80)}"`;
      } else if (aux?.url?.value) {
        detail = ` → ${aux.url.value}`;
      } else if (aux?.direction?.value) {
        detail = ` ${aux.direction.value}`;
      }

      const stepLabel = pendingStep ? `${pendingStep} ` : "";
      pendingStep = "";
      sink.log(`  [step ${stepLabel}${tool}]${detail}`);
      return;
    }

    if (msg.includes("Reasoning:") || msg.includes("reasoning:")) {
      const reasoning = msg.replace(/.*[Rr]easoning:\s*/, "").trim();
      if (reasoning.length > 0) {
        sink.log(`  [thinking] ${reasoning}`);
      }
    }
  };
}

type StagehandPage = ReturnType<Stagehand["context"]["pages"]>[number];

/** A Stagehand instance plus the Chrome process it drives over CDP. */
export class StagehandSession implements SessionHandle {
  readonly id: string;
  readonly stagehand: Stagehand;
  private chrome: ChildProcess;

  constructor(id: string, stagehand: Stagehand, chrome: ChildProcess) {
    this.id = id;
    this.stagehand = stagehand;
    this.chrome = chrome;
  }

  currentUrl(): string {
    return this.activePage()?.url() ?? "about:blank";
  }

  async inspectPage(): Promise<PageInspection> {
    const page = this.activePage();
    if (!page) {
      return { url: "about:blank", title: "", bodyTextLength: 0 };
    }
    const title = await page.title();
    const bodyTextLength = await page.evaluate(
      () => document.body?.innerText.length ?? 0,
    );
    return { url: page.url(), title, bodyTextLength };
  }

  async captureScreenshot(filePath: string): Promise<void> {
    const page = this.activePage();
    if (!page) throw new Error("No open page to capture");
    const buffer = await page.screenshot({ fullPage: false });
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, buffer);
  }

  async close(): Promise<void> {
    try {
      await this.stagehand.close();
    } finally {
      this.chrome.kill();
    }
  }

  private activePage(): StagehandPage | undefined {
    return this.stagehand.context.pages()[0];
  }
}

/**
 * Launches Playwright's Chromium with a persistent profile under the data
 * directory and attaches Stagehand to it.
 */
export function createStagehandSessionFactory(
  config: AppConfig,
  sink: OutputSink,
): SessionFactory {
  let launched = 0;

  return {
    async create(signal) {
      const chromePath = findPlaywrightChromium();
      const chrome = await launchChrome(chromePath, config, browserProfileDir(config));

      try {
        throwIfAborted(signal);
        const stagehand = new Stagehand({
          env: "LOCAL",
          // agent execute() only accepts an abort signal with experimental features on
          experimental: true,
          model: config.agentModel,
          localBrowserLaunchOptions: {
            cdpUrl: chrome.wsUrl,
            viewport: config.viewport,
          },
          logger: buildStagehandLogger(sink),
        });
        await stagehand.init();
        launched += 1;
        return new StagehandSession(`browser-${launched}`, stagehand, chrome.process);
      } catch (err) {
        chrome.process.kill();
        throw err;
      }
    },
  };
}
