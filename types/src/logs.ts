import { z } from 'zod';

// 로그 레벨 스키마 (심각도 높은 순)
export const LogLevelSchema = z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// 로그 카테고리 스키마
export const LogCategorySchema = z.enum(['probe', 'hardware', 'planner', 'encoder', 'verify', 'system']);
export type LogCategory = z.infer<typeof LogCategorySchema>;

// 단일 로그 항목 스키마
export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  category: LogCategorySchema,
  message: z.string(),
  meta: z.unknown().optional(),
  createdAt: z.string(), // ISO 8601 형식
});
export type LogEntry = z.infer<typeof LogEntrySchema>;
