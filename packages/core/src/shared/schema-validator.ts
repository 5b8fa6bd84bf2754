import { ValidationError } from './errors.js';

export interface SchemaErrorDetail {
  instancePath?: string;
  message?: string;
}

export type SchemaGuard<T> = ((data: unknown) => data is T) & {
  errors?: SchemaErrorDetail[] | null;
};

interface AjvInstance {
  compile<T>(schema: Record<string, unknown>): SchemaGuard<T>;
}

// Lazy-initialized Ajv instance (avoids ESM/CJS import issues at module level)
let _ajv: AjvInstance | null = null;
async function getAjv(): Promise<AjvInstance> {
  if (_ajv) return _ajv;
  // Dynamic import handles ESM/CJS interop correctly
  const mod = await import('ajv');
  const AjvClass = mod.default ?? mod;
  _ajv = new (AjvClass as unknown as { new(opts: { allErrors: boolean }): AjvInstance })({ allErrors: true });
  return _ajv;
}

export function formatSchemaErrors(errors: SchemaErrorDetail[] | null | undefined): string {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile `schema` and check `data` against it, narrowing to `T` on success.
 * Throws ValidationError listing every schema violation otherwise.
 */
export async function validateWithSchema<T>(
  schema: Record<string, unknown>,
  data: unknown,
  label: string,
): Promise<T> {
  const ajv = await getAjv();
  const validateFn = ajv.compile<T>(schema);
  if (validateFn(data)) return data;
  throw new ValidationError(
    `${label} failed schema validation: ${formatSchemaErrors(validateFn.errors)}`,
    label,
    { schema_errors: validateFn.errors },
  );
}
