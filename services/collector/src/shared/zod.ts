import type { ZodError } from 'zod';

/**
 * zod の検証エラーを1行のメッセージにまとめる。
 */
export function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
