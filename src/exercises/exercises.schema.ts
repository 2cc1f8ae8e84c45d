import { z } from 'zod'

export const exerciseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  muscleGroups: z.array(z.string().min(1)),
})

export const exerciseCatalogSchema = z.array(exerciseSchema).superRefine((items, ctx) => {
  const seen = new Set<string>()
  items.forEach((item, i) => {
    if (seen.has(item.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate exercise id ${item.id}`, path: [i, 'id'] })
    }
    seen.add(item.id)
  })
})
