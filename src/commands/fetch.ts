/**
 * Fetch Command
 * Reads every record of a Graph collection and prints it as JSON
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { createApiClient } from '../lib/api-client.js';
import type { GraphApiClient } from '../services/api.js';
import { DEFAULT_PAGE_SIZE } from '../lib/odata.js';
import { formatDuration, loggers } from '../lib/logger.js';
import { GRAPH_VERSIONS, type GraphVersion } from '../types/graph.js';
import { EXIT_CODES, exitCodeFor, formatJSON } from '../utils/output.js';
import type { GlobalOptions } from '../cli.js';

interface FetchCommandOptions {
  apiVersion: string;
  top: number;
  orderby?: string;
  filter?: string;
}

export function parsePageSize(value: string): number {
  const size = Number(value);
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return size;
}

function isGraphVersion(value: string): value is GraphVersion {
  return GRAPH_VERSIONS.some((version) => version === value);
}

/**
 * graph-collector fetch <endpoint>
 */
export function createFetchCommand(): Command {
  return new Command('fetch')
    .description('Fetch all records of a Graph collection, following every page')
    .argument('<endpoint>', 'resource path, e.g. users or teams/{id}/channels')
    .addOption(
      new Option('--api-version <version>', 'Graph API version')
        .choices([...GRAPH_VERSIONS])
        .default('v1.0')
    )
    .option('--top <n>', 'page size hint ($top)', parsePageSize, DEFAULT_PAGE_SIZE)
    .option('--orderby <expr>', 'sort expression ($orderby)')
    .option('--filter <expr>', 'filter expression ($filter)')
    .action(async (endpoint: string, options: FetchCommandOptions, cmd: Command) => {
      const { config } = cmd.optsWithGlobals<GlobalOptions>();
      const version = options.apiVersion;
      if (!isGraphVersion(version)) {
        cmd.error(`Unknown API version: ${version}`, { exitCode: EXIT_CODES.CONFIG });
      }

      const startTime = Date.now();
      let client: GraphApiClient | undefined;
      try {
        client = createApiClient(config);
        const records = await client.fetchAll(version, endpoint, {
          top: options.top,
          orderby: options.orderby,
          filter: options.filter,
        });

        loggers.cli.info('Fetch completed', {
          endpoint,
          records: records.length,
          elapsed: formatDuration(Date.now() - startTime),
        });
        console.log(formatJSON(records));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        cmd.error(`Error: ${message}`, { exitCode: exitCodeFor(error) });
      } finally {
        client?.close();
      }
    });
}
