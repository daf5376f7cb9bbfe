/**
 * Auth Command
 * Performs one client-credentials login to check the configured credentials
 */

import { Command, type OptionValues } from 'commander';
import { createApiClient } from '../lib/api-client.js';
import type { GraphApiClient } from '../services/api.js';
import { exitCodeFor, formatJSON } from '../utils/output.js';
import type { GlobalOptions } from '../cli.js';

/**
 * graph-collector auth
 * Prints `{ success, tenantId, expiresAt }`; the token itself is never printed
 */
export function createAuthCommand(): Command {
  return new Command('auth')
    .description('Request an access token to verify the configured credentials')
    .action(async (_options: OptionValues, cmd: Command) => {
      const { config } = cmd.optsWithGlobals<GlobalOptions>();

      let client: GraphApiClient | undefined;
      try {
        client = createApiClient(config);
        await client.login();

        console.log(
          formatJSON({
            success: true,
            tenantId: client.getTenantId(),
            expiresAt: client.getTokenExpiry()?.toISOString() ?? null,
          })
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        cmd.error(`Error: ${message}`, { exitCode: exitCodeFor(error) });
      } finally {
        client?.close();
      }
    });
}
