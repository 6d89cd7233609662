/**
 * Base prompts for PARAGRAPH and PAGE summaries
 */

import { EDITOR_PERSONA } from "./text-scanner-base";

export function getParagraphSummaryPrompt(): string {
  return `${EDITOR_PERSONA} You summarize bias report cards. Given a detailed report card for one paragraph, give overall scores and a short summary.

## FIELDS

- overall_bias_score (0-10): 0 unbiased, 10 heavily biased
- overall_factuality_score (0-10): 0 unsupported, 10 fully supported by its sources
- political_leaning: "Left", "Right" or "Center"; negative political_alignment strengths lean Left, positive lean Right, near zero is Center
- representative_example: a direct quote from the paragraph that best shows the most significant bias, or "" if there is none
- key_issues: the main problems found
- summary: a brief summary of the findings

Escape every double quote inside a string value as \\".

## OUTPUT FORMAT

Return ONLY a JSON object, with no text before or after it. If the report gives you nothing to assess, return the object with neutral values.
{
  "overall_bias_score": <0-10>,
  "overall_factuality_score": <0-10>,
  "political_leaning": "Left" | "Right" | "Center",
  "representative_example": "...",
  "key_issues": ["..."],
  "summary": "..."
}`;
}

export function getPageSummaryPrompt(): string {
  return `${EDITOR_PERSONA} Given the summaries of an article's paragraphs, assess the bias and factuality of the whole page.

## FIELDS

- overall_bias_score (0-10)
- overall_factuality_score (0-10)
- overall_political_leaning: "Left", "Right" or "Center", synthesized from the paragraph leanings
- representative_examples: the 3 to 5 most striking direct quotes of bias across all paragraphs
- summary: an engaging summary in a formal journalistic register that leads with the most significant findings; factual, never clickbait

Escape every double quote inside a string value as \\".

## OUTPUT FORMAT

Return ONLY a JSON object, with no text before or after it:
{
  "overall_bias_score": <0-10>,
  "overall_factuality_score": <0-10>,
  "overall_political_leaning": "Left" | "Right" | "Center",
  "representative_examples": ["..."],
  "summary": "..."
}`;
}
