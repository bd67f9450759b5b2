#!/usr/bin/env node
/**
 * Analyze CLI Script — the pipeline without the HTTP server
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run analyze -- "测试科技有限公司" [--json]
 *
 * Runs the same AnalysisService the /analyze route uses and prints the
 * report, or the same user-facing message the API would return. `--json`
 * prints the response envelope instead. Exit code is 0 on success, 1 on
 * any pipeline failure, 2 on bad usage.
 *
 * stdout carries only that output; pipeline logs go to stderr, so
 * `--json` can be piped into another tool.
 */
import 'dotenv/config';

import { AnalysisService } from '@application/services/AnalysisService';
import { container } from '@core/container';
import { createLogger, type Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { toAnalysisResponse } from '@interfaces/http/presenters/analysisResponse';
import pino from 'pino';

export interface CliStreams {
  stdout: { write(chunk: string): unknown };
  stderr: pino.DestinationStream;
}

// Main

export async function main(
  argv: string[],
  streams: CliStreams = { stdout: process.stdout, stderr: pino.destination(2) },
): Promise<number> {
  const print = (line: string): void => {
    streams.stdout.write(`${line}\n`);
  };

  const companyName = argv.filter((arg) => !arg.startsWith('--')).join(' ');
  const asJson = argv.includes('--json');

  if (companyName === '') {
    print('  Usage: npm run analyze -- "<公司名称>" [--json]');
    return 2;
  }

  container.register<Logger>(TOKENS.Logger, { useValue: createLogger(streams.stderr) });

  const service = container.resolve<AnalysisService>(TOKENS.AnalysisService);
  const startTime = Date.now();
  const result = await service.analyze(companyName);
  const { statusCode, body } = toAnalysisResponse(result);

  if (asJson) {
    print(JSON.stringify({ statusCode, ...body }, null, 2));
    return result.ok ? 0 : 1;
  }

  if (body.status === 'error') {
    print(`  ERROR (${statusCode}): ${body.message}`);
    return 1;
  }

  print('');
  print(`  ${body.data.companyName}  (${Date.now() - startTime}ms)`);
  print('');
  print(body.data.report);
  print('');
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error('Analysis failed:', err);
      process.exitCode = 1;
    });
}
