import { z } from 'zod';

/** CLI 覆盖项：--status 从命令行读到的是字符串 */
export const ProblemOverridesInput = z.object({
  detail: z.string().optional(),
  instance: z.string().optional(),
  status: z.coerce.number().int().min(100).max(599).optional(),
  title: z.string().optional(),
  type: z.string().optional(),
});
