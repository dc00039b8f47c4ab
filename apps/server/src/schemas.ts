import { z } from "zod";
import { ValidationError } from "@deckname/core";

export const renameRequestSchema = z
  .object({
    path: z.string().trim().min(1, "path is required"),
    recursive: z.boolean().optional(),
    dryRun: z.boolean().optional(),
    template: z.string().optional(),
    selectedFiles: z.array(z.string().min(1)).optional()
  })
  .strict();

export type RenameRequestBody = z.infer<typeof renameRequestSchema>;

export const templateRequestSchema = z.object({
  template: z.string()
});

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }));
    throw new ValidationError("Invalid request body", { issues });
  }
  return parsed.data;
}
