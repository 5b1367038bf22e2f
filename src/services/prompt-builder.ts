import { ChartSpec } from '../types/schemas';
import { ChartKind } from '../utils/chart-types';

const KIND_RULES: Record<ChartKind, string> = {
  'bar': '- Use between 4 and 10 categories and 1 to 3 series of non-negative values',
  'horizontal-bar': '- Use between 4 and 10 categories with short labels and 1 to 3 series',
  'stacked-bar': '- Use between 3 and 8 categories and 2 to 4 series whose values stack meaningfully',
  'line': '- Use between 6 and 12 ordered categories (dates, years or steps) and 1 to 3 series',
  'area': '- Use between 6 and 12 ordered categories (dates, years or steps) and 1 to 3 series',
  'pie': '- Use exactly ONE series with 3 to 8 categories of positive values that form parts of a whole',
  'donut': '- Use exactly ONE series with 3 to 8 categories of positive values that form parts of a whole',
  'scatter': '- "categories" are the x values written as numeric strings (e.g. "12.5"); use 10 to 25 points and 1 or 2 series'
};

export interface TopicPromptInput {
  persona: string;
  chartType: string;
  language: string;
}

export interface DataPromptInput {
  topic: string;
  persona: string;
  chartType: string;
  chartKind: ChartKind;
  language: string;
}

export interface AnnotationPromptInput {
  spec: ChartSpec;
  chartType: string;
  language: string;
  qaCount: number;
}

export class PromptBuilder {
  languageInstruction(language: string): string {
    return `LANGUAGE:\nWrite every natural-language string (titles, labels, series names, captions, questions and answers) in ${language}. JSON keys stay in English.`;
  }

  buildTopicPrompt(input: TopicPromptInput): string {
    return `You are helping the following persona create a ${input.chartType}:

PERSONA:
${input.persona}

Propose ONE specific, realistic topic this persona would visualise as a ${input.chartType}.

Requirements:
- The topic must suit a ${input.chartType} and be concrete (who, what, where, when)
- Avoid generic topics such as "sales by month" without context

${this.languageInstruction(input.language)}

Return a JSON object with exactly this shape:
{"topic": "<one sentence topic>"}`;
  }

  buildDataPrompt(input: DataPromptInput): string {
    return `Generate the data for a ${input.chartType} about this topic:

TOPIC:
${input.topic}

The chart is made for: ${input.persona}

Requirements:
- Values must be plausible numbers for the topic; do not use round placeholder values everywhere
- Every series must contain exactly one value per category, in category order
${KIND_RULES[input.chartKind]}
- Give the chart a short descriptive title
- Axis labels should include units where they apply

${this.languageInstruction(input.language)}

Return a JSON object with exactly this shape:
{
  "title": "<chart title>",
  "x_axis_label": "<label for the category axis>",
  "y_axis_label": "<label for the value axis>",
  "categories": ["<category 1>", "<category 2>"],
  "series": [{"name": "<series name>", "values": [0, 0]}]
}`;
  }

  buildAnnotationPrompt(input: AnnotationPromptInput): string {
    const pairs = input.qaCount === 1 ? 'question/answer pair' : 'question/answer pairs';

    return `The following data is rendered as a ${input.chartType}:

${JSON.stringify(input.spec, null, 2)}

Write a caption describing the chart and ${input.qaCount} ${pairs} about it.

Requirements:
- The caption states what the chart shows and its most notable pattern
- Every question must be answerable by reading the chart alone
- Answers are short and exact; numeric answers use the values from the data
- Mix question types: value lookup, comparison, extremes and trends

${this.languageInstruction(input.language)}

Return a JSON object with exactly this shape:
{
  "caption": "<caption>",
  "qa_pairs": [{"question": "<question>", "answer": "<answer>"}]
}`;
  }
}
