import * as z from 'zod/v4';

export const RootSchema = z.object({ message: z.string() });

export function getRoot(): z.infer<typeof RootSchema> {
  return { message: 'Hello, World!' };
}
