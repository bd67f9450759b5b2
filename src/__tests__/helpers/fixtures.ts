/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Registry records, provider envelopes and config slices shared across the
 * suites. Company names and figures are made up; credentials are plain
 * placeholders.
 */
import type { CompletionConfig, RegistryConfig, ReportConfig } from '@core/config';
import type { BusinessRecord } from '@domain/entities/BusinessRecord';
import pino from 'pino';

export const silentLogger = pino({ level: 'silent' });

/** Minimal record, as in the registry's own documentation example. */
export const minimalRecord: BusinessRecord = {
  name: '测试科技有限公司',
  regStatus: '在业',
};

/** A fuller record with the fields the report prompt talks about. */
export const sampleRecord: BusinessRecord = {
  name: '测试科技有限公司',
  estiblishTime: 1420041600000,
  legalPersonName: '张三',
  regCapital: '100万人民币',
  regStatus: '在业',
  regLocation: '上海市浦东新区测试路1号',
  industry: '软件和信息技术服务业',
  businessScope: '软件开发；信息技术咨询服务。',
  tmNum: 0,
  patentNum: null,
  socialStaffNum: null,
  actualCapital: '',
  staffList: { total: 1, result: [{ name: '张三', typeJoin: ['执行董事'] }] },
};

export const registryConfig: RegistryConfig = {
  apiUrl: 'http://registry.test/search',
  token: 'test-registry-token',
  timeoutMs: 10_000,
  userAgent: null,
};

export const completionConfig: CompletionConfig = {
  apiKey: 'test-secret',
  baseUrl: 'http://completion.test',
  model: 'deepseek-chat',
  maxTokens: 1500,
  temperature: 0.5,
  timeoutMs: 60_000,
};

export const reportConfig: ReportConfig = {
  referenceYear: 2025,
  includeOutlook: true,
};

export const sampleReport = '### 企业速览：关键信息一目了然\n🏢 测试科技有限公司 | 📆 成立10年';
