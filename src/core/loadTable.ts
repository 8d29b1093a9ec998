import type { z } from 'zod';
import { ErrorCode, PayrollError } from './errors';

/** 内置 JSON 数据（费率表、假日表）加载时校验，出错即数据 bug */
export function loadTable<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PayrollError({
      code: ErrorCode.INVALID_TABLE,
      message: `invalid data table: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}
