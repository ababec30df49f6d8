import { execFile } from "child_process";
import os from "os";
import type { SystemProbe } from "./types.js";

/**
 * Host probe for session creation. Cleanup only targets browser processes
 * whose command line mentions `processPattern` (our profile directory), so
 * a user's own browser is left alone.
 */
export function createSystemProbe(processPattern: string): SystemProbe {
  return {
    memoryUsagePercent() {
      const total = os.totalmem();
      return total > 0 ? ((total - os.freemem()) / total) * 100 : 0;
    },
    killStrayBrowsers() {
      return new Promise((resolve, reject) => {
        execFile("pkill", ["-f", processPattern], (err) => {
          // pkill exits 1 when nothing matched
          if (err && err.code !== 1) {
            reject(err);
            return;
          }
          setTimeout(resolve, 1000);
        });
      });
    },
  };
}
