import type { ChallengeSolver } from "../clients/challengeSolver";
import type { ProxyPool } from "../clients/proxyPool";
import { query } from "../db/client";
import { errorMessage } from "./logger";

export interface SentinelTargets {
  pool: ProxyPool;
  solver: ChallengeSolver;
  checkDatabase?: () => Promise<void>;
}

async function pingDatabase(): Promise<void> {
  await query("SELECT 1");
}

/**
 * Verifies the infrastructure an extraction run depends on.
 * Run this at the start of every job.
 * @throws Error if the database is unreachable
 */
export async function runSentinelCheck(targets: SentinelTargets): Promise<void> {
  console.log(`[${new Date().toLocaleTimeString()}] 🛡️ Running Sentinel Infrastructure Check...`);

  // --- CRITICAL: Database ---
  try {
    await (targets.checkDatabase ?? pingDatabase)();
    console.log(`    ✅ Database: Reachable`);
  } catch (err: unknown) {
    throw new Error(`CRITICAL: Database unreachable. Stopping job. (${errorMessage(err)})`);
  }

  // --- NON-CRITICAL: Proxies ---
  if (targets.pool.size > 0) {
    console.log(`    ✅ Proxies: ${targets.pool.size} configured`);
  } else {
    console.warn("    ⚠️  WARNING: No proxies configured.");
    console.warn("   Requests will go out directly and are more likely to be blocked.");
  }

  // --- NON-CRITICAL: Challenge solver ---
  if (!targets.solver.enabled) {
    console.warn("    ⚠️  WARNING: No challenge solver configured.");
    console.warn("   Challenged pages will be retried and then recorded as failures.");
    return;
  }

  try {
    await targets.solver.healthCheck();
    console.log(`    ✅ Challenge solver: Reachable`);
  } catch (err: unknown) {
    console.warn("    ⚠️  WARNING: Challenge solver health check failed.");
    console.warn("   Extraction will proceed, but challenges may go unsolved.");
    console.warn(`   Reason: ${errorMessage(err)}`);
  }
}
