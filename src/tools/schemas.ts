import { z } from "zod";

// Edit tools schemas
export const EditOperationSchema = z.object({
  kind: z.enum(['insert', 'delete', 'replace']),
  start_pattern: z.string().optional(),
  end_pattern: z.string().optional(),
  after_pattern: z.string().optional(),
  before_pattern: z.string().optional(),
  expected_content: z.string().optional(),
  content: z.array(z.string()).optional(),
});

export type EditOperation = z.infer<typeof EditOperationSchema>;

export const EditFileArgsSchema = z.object({
  file_path: z.string(),
  operations: z.array(EditOperationSchema),
});

export const AppendTextArgsSchema = z.object({
  file_path: z.string(),
  content: z.array(z.string()),
  ensure_newline: z.boolean().optional().default(true),
});
