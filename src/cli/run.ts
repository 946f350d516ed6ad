/**
 * @fileoverview One CLI invocation: configuration, argument parsing, the
 * loop-trim run and its report. Every failure, configuration included, is
 * printed as `Error [<code>]: <message>` and turned into exit status 1.
 * @module src/cli/run
 */
import { formatRunReport, parseCliArgs, USAGE, wantsHelp } from '@/cli/options.js';
import { loadConfig } from '@/config/index.js';
import { composeContainer, container } from '@/container/index.js';
import { LoopTrimService } from '@/container/tokens.js';
import type { LoopTrimService as LoopTrimServiceClass } from '@/services/loop-trim/index.js';
import {
  JsonRpcErrorCode,
  McpError,
  errorCodeName,
} from '@/types-global/errors.js';
import { logger, requestContextService } from '@/utils/index.js';

/**
 * @returns the process exit status
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  if (wantsHelp(argv)) {
    process.stdout.write(USAGE);
    return 0;
  }

  const context = requestContextService.createRequestContext({
    operation: 'CliRun',
  });

  try {
    const appConfig = loadConfig();
    composeContainer(appConfig);

    const params = parseCliArgs(argv, {
      chainId: appConfig.defaultChainId,
      workDir: appConfig.workDir,
    });
    const service = container.resolve<LoopTrimServiceClass>(LoopTrimService);
    const result = await service.run(params, context);

    process.stdout.write(`${formatRunReport(result).join('\n')}\n`);
    return 0;
  } catch (error) {
    const mcpError =
      error instanceof McpError
        ? error
        : new McpError(
            JsonRpcErrorCode.InternalError,
            error instanceof Error ? error.message : String(error),
          );
    logger.error('Loop-trim run failed', {
      ...context,
      code: mcpError.code,
      error: mcpError,
    });
    process.stderr.write(
      `Error [${errorCodeName(mcpError.code)}]: ${mcpError.message}\n`,
    );
    if (mcpError.code === JsonRpcErrorCode.InvalidParams) {
      process.stderr.write(`\n${USAGE}`);
    }
    return 1;
  }
}
