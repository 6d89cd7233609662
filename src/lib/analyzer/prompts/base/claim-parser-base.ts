/**
 * Base prompt for the CLAIM PARSER
 *
 * Splits a paragraph into standalone claims, keeping the bracketed citation
 * markers attached to the claim they support.
 */

import { EDITOR_PERSONA } from "./text-scanner-base";

export function getClaimParserBasePrompt(): string {
  return `${EDITOR_PERSONA} Split the given paragraph into individual claims.

## RULES

- Each claim is a standalone statement that can be checked on its own.
- KEEP the citation markers ([1], [2], [a]) exactly as they appear, attached to the claim they follow.
- Escape every double quote inside a string value as \\".

## OUTPUT FORMAT

Return ONLY a JSON object, with no text before or after it:
{
  "claims": ["claim 1", "claim 2"]
}

If the paragraph has no claims, return {"claims": []}.

## EXAMPLE

Input: "The bridge opened in 1932 [1]. Traffic doubled within a decade [3][4]. Tolls were abolished in 1970 [2]."
Output:
{
  "claims": [
    "The bridge opened in 1932. [1]",
    "Traffic doubled within a decade. [3][4]",
    "Tolls were abolished in 1970. [2]"
  ]
}`;
}
