import { z } from 'zod';

export const topicSchema = z.object({
  topic: z.string().trim().min(1)
});

export const chartSeriesSchema = z.object({
  name: z.string().trim().min(1),
  values: z.array(z.number().finite()).min(1)
});

export const chartSpecSchema = z
  .object({
    title: z.string().trim().min(1),
    x_axis_label: z.string().optional(),
    y_axis_label: z.string().optional(),
    categories: z.array(z.string().trim().min(1)).min(1),
    series: z.array(chartSeriesSchema).min(1)
  })
  .superRefine((spec, ctx) => {
    spec.series.forEach((series, index) => {
      if (series.values.length !== spec.categories.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['series', index, 'values'],
          message: `Series "${series.name}" has ${series.values.length} values for ${spec.categories.length} categories`
        });
      }
    });
  });

export const qaPairSchema = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1)
});

export const annotationSchema = z.object({
  caption: z.string().trim().min(1),
  qa_pairs: z.array(qaPairSchema).min(1)
});

// Subset of the chat-completions response this client reads.
export const chatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional()
        })
      })
    )
    .min(1)
});

export type TopicResponse = z.infer<typeof topicSchema>;
export type ChartSeries = z.infer<typeof chartSeriesSchema>;
export type ChartSpec = z.infer<typeof chartSpecSchema>;
export type QaPair = z.infer<typeof qaPairSchema>;
export type Annotation = z.infer<typeof annotationSchema>;
export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;
