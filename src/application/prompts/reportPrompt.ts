/**
 * Report Prompt Builder
 * Layer: Application
 *
 * Pure function from a BusinessRecord to the system/user message pair sent
 * to the completion provider. No I/O, no clock: the reference year comes in
 * through options so tenure ("成立N年") is computed against a fixed year and
 * the output is reproducible in tests.
 *
 * Section order is fixed: 企业速览, 经营概况, 经营状况, 风险提示, and
 * optionally 未来关注. The 经营状况 bullets tell the model how to word
 * missing or zero fields instead of skipping them.
 */
import type { BusinessRecord } from '@domain/entities/BusinessRecord';
import type { CompletionRequest } from '@domain/interfaces/ICompletionClient';

export interface ReportPromptOptions {
  referenceYear: number;
  includeOutlook: boolean;
}

export const REPORT_SYSTEM_PROMPT =
  '你是一位顶级的商业分析专家，严格按照用户指令生成格式化的报告。';

/** Two-space indented JSON; non-ASCII characters are kept as-is. */
export function serializeRecord(record: BusinessRecord): string {
  return JSON.stringify(record, null, 2);
}

export function buildReportPrompt(
  record: BusinessRecord,
  options: ReportPromptOptions,
): CompletionRequest {
  const year = options.referenceYear;

  const sections = [
    [
      '### 企业速览：关键信息一目了然',
      '🏢 [公司名] | 📆 成立[年数]年 | 👨‍⚖️ 法定代表人：[法人名]',
      '💼 注册资本：[注册资本] | 经营状态：[经营状态]',
      '📍 注册地址：[注册地址]',
      '⚖️ 行业性质：[行业]',
      '---',
      '我们为您精选了以下值得关注的核心内容',
      '---',
    ],
    [
      '### 🏭 经营概况',
      `- **📈 持续经营**：根据成立日期（estiblishTime）和当前年份（${year}）计算运营年限，并描述其运营历史。`,
      '- **🔧 业务聚焦**：总结`businessScope`字段中的核心业务。',
      '- **📊 架构精简**：根据对外投资、分支机构等数据（如果为0或null），判断并说明其组织架构是否精简明晰。',
    ],
    [
      '### 📊 经营状况',
      '- **✅ 风险可控**：总结司法案件、涉诉关系等法律风险。如果数据为0或null，明确指出“当前无公开的法律纠纷记录”。',
      '- **📉 创新储备**：分析知识产权（商标`tmNum`、专利`patentNum`）情况。如果为零或缺失，指出其“创新储备尚未展开”。',
      '- **⚠️ 数据缺失**：检查`socialStaffNum`（社保人数）、`actualCapital`（实缴资本）等字段，如果为空或null，明确指出“关键财务信息未公示”。',
    ],
    [
      '### 🚩 风险提示',
      '- 结合经营状态、变更记录数量、涉诉数量与信息公示情况，列出不超过3条需要重点关注的风险点；没有明显风险时写明“暂未发现明显风险信号”。',
    ],
  ];

  if (options.includeOutlook) {
    sections.push([
      '### 🔭 未来关注',
      '- 基于以上数据，给出2至3条后续值得跟踪的方向（如资本实缴进展、知识产权布局、业务范围变化），不要编造数据中不存在的事实。',
    ]);
  }

  const user = [
    '你是一位顶级的商业分析专家。你的任务是根据提供的企业JSON数据，生成一份专业、精炼且易于阅读的企业分析报告。',
    '**严格遵循以下格式和要求进行输出，不要有任何额外解释：**',
    `**当前年份：${year}年**`,
    '',
    sections.map((lines) => lines.join('\n')).join('\n\n'),
    '',
    '**现在，请根据以下公司JSON数据开始分析:**',
    serializeRecord(record),
  ].join('\n');

  return { system: REPORT_SYSTEM_PROMPT, user };
}
