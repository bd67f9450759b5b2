/**
 * Unit Tests — Analyze CLI
 *
 * Runs `main` with in-memory stdout/stderr and mocked provider clients.
 * Modules are reloaded with LOG_LEVEL=info so the pipeline's log line is
 * actually written, which is what shows it lands on stderr and leaves
 * stdout holding nothing but the command's output.
 */
import { err, ok } from '@shared/result';

import { minimalRecord, sampleReport } from '../helpers/fixtures';
import {
  createMockCompletionClient,
  createMockRegistryClient,
  MockCompletionClient,
  MockRegistryClient,
} from '../helpers/mockClients';
import type { CliStreams } from '../../scripts/analyze';

type Main = (argv: string[], streams: CliStreams) => Promise<number>;

function createSink(): { write(chunk: string): void; chunks: string[] } {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
    },
  };
}

describe('analyze CLI', () => {
  const savedEnv = { ...process.env };

  let main: Main;
  let registry: MockRegistryClient;
  let completion: MockCompletionClient;
  let stdout: ReturnType<typeof createSink>;
  let stderr: ReturnType<typeof createSink>;

  beforeEach(async () => {
    jest.resetModules();
    process.env.LOG_LEVEL = 'info';

    const { container } = await import('tsyringe');
    const { TOKENS } = await import('@core/types');
    await import('@core/container');

    registry = createMockRegistryClient();
    completion = createMockCompletionClient();
    container.register(TOKENS.RegistryClient, { useValue: registry });
    container.register(TOKENS.CompletionClient, { useValue: completion });

    ({ main } = await import('../../scripts/analyze'));
    stdout = createSink();
    stderr = createSink();
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  const run = (...argv: string[]): Promise<number> => main(argv, { stdout, stderr });

  it('should print only the success envelope on stdout with --json', async () => {
    registry.lookup.mockResolvedValue(ok(minimalRecord));
    completion.complete.mockResolvedValue(ok(sampleReport));

    const code = await run('测试科技有限公司', '--json');

    expect(code).toBe(0);
    expect(JSON.parse(stdout.chunks.join(''))).toEqual({
      statusCode: 200,
      status: 'success',
      data: {
        companyName: '测试科技有限公司',
        rawData: { name: '测试科技有限公司', regStatus: '在业' },
        report: sampleReport,
      },
    });
  });

  it('should write the pipeline log line to stderr', async () => {
    registry.lookup.mockResolvedValue(ok(minimalRecord));
    completion.complete.mockResolvedValue(ok(sampleReport));

    await run('测试科技有限公司', '--json');

    const lines = stderr.chunks.join('').split('\n').filter((line) => line !== '');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      msg: 'Analysis finished',
      companyName: '测试科技有限公司',
      outcome: 'success',
    });
  });

  it('should print the error envelope and exit 1 when a credential is missing', async () => {
    registry.isConfigured.mockReturnValue(false);

    const code = await run('测试科技有限公司', '--json');

    expect(code).toBe(1);
    expect(JSON.parse(stdout.chunks.join(''))).toEqual({
      statusCode: 500,
      status: 'error',
      message: '服务器未配置API密钥，请联系管理员。',
    });
    expect(registry.lookup).not.toHaveBeenCalled();
  });

  it('should print the user-facing message without --json', async () => {
    registry.lookup.mockResolvedValue(err({ kind: 'not_found' }));

    const code = await run('不存在的公司');

    expect(code).toBe(1);
    expect(stdout.chunks.join('')).toBe(
      "  ERROR (404): 未能从天眼查获取到'不存在的公司'的相关信息，请检查公司名称是否正确。\n",
    );
  });

  it('should print usage and exit 2 without a company name', async () => {
    const code = await run('--json');

    expect(code).toBe(2);
    expect(stdout.chunks.join('')).toBe('  Usage: npm run analyze -- "<公司名称>" [--json]\n');
    expect(registry.lookup).not.toHaveBeenCalled();
  });
});
