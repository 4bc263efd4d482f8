import { ConfigurationError } from "@keymap/errors"
import { z } from "zod"

export const referenceOptionsSchema = z.object({
  model: z.string({ error: "No model provided" }).min(1, { error: "No model provided" }),
  index: z.boolean().optional(),
})

export type ReferenceOptions = z.input<typeof referenceOptionsSchema>

export type ReferenceConfig = Readonly<{
  model: string
  indexed: boolean
}>

/**
 * @throws ConfigurationError when `model` is missing or empty.
 */
export function parseReferenceOptions(options: unknown): ReferenceConfig {
  const result = referenceOptionsSchema.safeParse(options)

  if (!result.success) {
    const first = result.error.issues[0]

    throw new ConfigurationError(
      first?.message ?? "Invalid reference options",
      { issues: result.error.issues.map((i) => ({ path: i.path.map(String), message: i.message })) },
      result.error,
    )
  }

  return { model: result.data.model, indexed: result.data.index ?? false }
}
