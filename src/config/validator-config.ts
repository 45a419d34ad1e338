import { z } from "zod";

import type { OnErrorFn } from "../core/types";
import { SchemaDefinitionError } from "../errors/types";

export const validatorConfigSchema = z.strictObject({
  strict: z.boolean().optional(),
  docsUrl: z.url().optional(),
  title: z.string().min(1).optional(),
});

export type ValidatorConfig = z.infer<typeof validatorConfigSchema> & {
  onError?: OnErrorFn;
};

/**
 * Checks the data fields of a validator configuration; `onError` is passed
 * through untouched.
 */
export function parseValidatorConfig(
  config: ValidatorConfig = {}
): ValidatorConfig {
  const { onError, ...data } = config;
  const result = validatorConfigSchema.safeParse(data);
  if (!result.success) {
    throw new SchemaDefinitionError(
      `Invalid validator config: ${z.prettifyError(result.error)}`,
      result.error
    );
  }
  return onError ? { ...result.data, onError } : result.data;
}
