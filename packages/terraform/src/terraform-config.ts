import { z } from "zod";

/**
 * Configuration for the Terraform render target.
 */
export const TerraformTargetConfigSchema = z.object({
  /** Default project for rendered resources and the provider block */
  project: z.string().min(1),
  /** Provider region */
  region: z.string().min(1),
  /** Directory the document is written to by finish(); nothing is written if omitted */
  outDir: z.string().min(1).optional(),
  /** Output file name inside outDir */
  fileName: z.string().min(1).default("main.tf.json"),
});

export type TerraformTargetConfig = z.infer<typeof TerraformTargetConfigSchema>;
export type TerraformTargetConfigInput = z.input<typeof TerraformTargetConfigSchema>;
