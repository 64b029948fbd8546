import { z } from 'zod';
import { ExecutionError } from '../provider.errors.js';
import { describeError } from '../provider.utils.js';

const ModelListSchema = z.object({
  data: z.array(
    z
      .object({
        id: z.string(),
      })
      .passthrough(),
  ),
});

/** Sorted model ids from a GET /models body. */
export function parseModelList(text: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ExecutionError(`Model list is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  const result = ModelListSchema.safeParse(parsed);
  if (!result.success) {
    throw new ExecutionError('Model list response has no data array of model ids');
  }
  return result.data.data.map((model) => model.id).sort();
}
