/** `error_code` the registry returns when the query succeeded. */
export const REGISTRY_OK_CODE = 0;

/** Reason reported when the registry rejects a query without saying why. */
export const REGISTRY_DEFAULT_REASON = '未知错误';

/** How much of a raw registry body goes into debug logs. */
export const LOG_BODY_PREVIEW_CHARS = 200;

/** How much of the registry token goes into debug logs. */
export const LOG_TOKEN_PREVIEW_CHARS = 4;

/** User-facing messages returned by POST /analyze. */
export const MESSAGES = {
  MISSING_COMPANY_NAME: '请求中缺少公司名称',
  EMPTY_COMPANY_NAME: '公司名称不能为空',
  NOT_CONFIGURED: '服务器未配置API密钥，请联系管理员。',
  GENERATION_UNREACHABLE: '报告生成服务暂时无法连接，请稍后重试。',
  GENERATION_FAILED: '报告生成失败，请稍后重试。',
  lookupFailed: (companyName: string): string =>
    `未能从天眼查获取到'${companyName}'的相关信息，请检查公司名称是否正确。`,
} as const;
