import axios from "axios";

const SENSITIVE_KEYS = [
  "KALSHI-ACCESS-KEY",
  "KALSHI-ACCESS-SIGNATURE",
  "Authorization",
  "Cookie",
  "api_key",
  "secret",
];

export function redactSensitiveValues(value: string): string {
  let redacted = value;
  for (const key of SENSITIVE_KEYS) {
    const keyRegex = new RegExp(`(${key})\\s*[:=]\\s*(["']?)[^\\s"',;]+\\2`, "gi");
    redacted = redacted.replace(keyRegex, "$1=<redacted>");
    const jsonRegex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, "gi");
    redacted = redacted.replace(jsonRegex, '$1"<redacted>"');
  }
  return redacted;
}

/**
 * Compact structured representation of an Axios error
 * Only includes essential debugging info without giant config dumps
 */
export interface CompactAxiosError {
  status?: number;
  method?: string;
  url?: string;
  errorMessage?: string;
  errorCode?: string;
}

export function extractCompactAxiosError(error: unknown): CompactAxiosError {
  if (!axios.isAxiosError(error)) {
    return {
      errorMessage: redactSensitiveValues(error instanceof Error ? error.message : String(error)),
    };
  }

  const compact: CompactAxiosError = {};
  if (error.response?.status) {
    compact.status = error.response.status;
  }
  if (error.config?.method) {
    compact.method = error.config.method.toUpperCase();
  }
  if (error.config?.url) {
    // path only, query strings stay out of logs
    compact.url = error.config.url.split("?")[0];
  }
  if (error.code) {
    compact.errorCode = error.code;
  }

  const responseData: unknown = error.response?.data;
  if (typeof responseData === "string" && responseData) {
    compact.errorMessage = redactSensitiveValues(responseData.slice(0, 200));
  } else if (responseData && typeof responseData === "object") {
    const errorText: unknown =
      "error" in responseData ? responseData.error : "message" in responseData ? responseData.message : undefined;
    if (errorText) {
      compact.errorMessage = redactSensitiveValues(
        (typeof errorText === "string" ? errorText : JSON.stringify(errorText)).slice(0, 200),
      );
    }
  }

  if (!compact.errorMessage && error.message) {
    compact.errorMessage = redactSensitiveValues(error.message.slice(0, 200));
  }

  return compact;
}

export function formatCompactError(compact: CompactAxiosError): string {
  const parts: string[] = [];
  if (compact.status) parts.push(`status=${compact.status}`);
  if (compact.method) parts.push(`method=${compact.method}`);
  if (compact.url) parts.push(`url=${compact.url}`);
  if (compact.errorCode) parts.push(`code=${compact.errorCode}`);
  if (compact.errorMessage) parts.push(`error="${compact.errorMessage}"`);
  return parts.join(" ");
}

export function sanitizeErrorMessage(error: unknown): string {
  return formatCompactError(extractCompactAxiosError(error));
}
