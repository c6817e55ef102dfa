import { bootstrap } from "../../libs/bootstrap/startup.js";
import type { VerificationResult } from "../../libs/audit/verifier.js";

/**
 * Chain Verification Proof
 * Replays each tenant's audit chain and prints the results as JSON.
 * Exit code 1 when any chain is broken or unreadable.
 *
 * Usage: npm run verify:chain -- <tenantId> [tenantId...]
 */
async function runChainVerification(tenantIds: string[]): Promise<number> {
    if (tenantIds.length === 0) {
        console.error("Usage: verify_chain <tenantId> [tenantId...]");
        return 2;
    }

    const trail = await bootstrap("verify-chain");
    const results: VerificationResult[] = [];
    try {
        for (const tenantId of tenantIds) {
            results.push(await trail.verify(tenantId));
        }
    } finally {
        await trail.close();
    }

    console.log(JSON.stringify(results, null, 2));
    return results.every(r => r.valid) ? 0 : 1;
}

runChainVerification(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error("CRITICAL: Chain verification could not run.");
        console.error(err);
        process.exitCode = 1;
    });
