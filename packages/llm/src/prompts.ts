// Instruction contract for the planning and summary calls.

export const PLAN_SYSTEM_PROMPT = [
  'You plan numeric queries over water and sanitation datasets.',
  'You are given a user question and documentation snippets for datasets and columns.',
  'Reply with a single JSON object describing how to compute the answer. No prose.',
  '',
  'Planning rules:',
  "- For percentages, shares or coverage, prefer columns whose names contain '_pct' or 'percentage'.",
  "- When two entities are compared (e.g. two countries), emit one metric per entity, each filtered with column='country', op='==', and set comparison.type='which_is_greater'.",
  "- For one explicit year, either set time_scope {type:'year', year} or filter the dataset's date column with '=='.",
  "- For two explicit years, emit two metrics, one filter per year, and keep time_scope.type='all'.",
  "- For 'on average' or 'over the years', use agg='mean' with time_scope.type='all'.",
  '- Copy dataset and column names exactly as they appear in the snippets.',
  "- When unsure about time, use time_scope.type='all'."
].join('\n');

export const PLAN_OUTPUT_SHAPE = `{
  "time_scope": {"type": "all"} | {"type": "year", "year": 2020} | {"type": "range", "start_year": 2018, "end_year": 2020},
  "metrics": [
    {
      "name": "unique_metric_name",
      "dataset": "dataset_name_from_context",
      "column": "column_name_from_context",
      "agg": "sum | mean | max | min",
      "filters": [{"column": "country", "op": "==", "value": "Uganda"}]
    }
  ],
  "comparison": {"type": "none | which_is_greater", "left_metric": "metric_name_or_null", "right_metric": "metric_name_or_null"}
}`;

export function planUserPrompt(question: string, context: string): string {
  return [
    'QUESTION:',
    question,
    '',
    'CONTEXT (datasets and columns):',
    context || '(no documentation retrieved)',
    '',
    'Output JSON with exactly this structure:',
    PLAN_OUTPUT_SHAPE,
    '',
    "filters may be an empty list. Metric names must be unique. Use comparison.type='none' when nothing is compared."
  ].join('\n');
}

export const SUMMARY_SYSTEM_PROMPT = [
  'You are a concise analyst. Explain the computed numbers in under 150 words.',
  '- Name the datasets and columns used.',
  "- Say how values were aggregated (e.g. 'average of safely_managed_pct over all years').",
  '- For a which_is_greater comparison, state which side is larger.',
  '- Mention limitations briefly, such as metrics that failed or missing years.',
  '- Do not introduce numbers that are not in the results.'
].join('\n');

export function summaryUserPrompt(payload: unknown): string {
  return JSON.stringify(payload, null, 2);
}
