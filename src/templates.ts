/**
 * Prompt templates and the placeholder contract.
 *
 * Only known `{name}` placeholders are substituted, so literal braces such as
 * the JSON example in the ranking template pass through untouched.
 */

export const CANDIDATE_PLACEHOLDERS = ["question", "participant_statements"] as const;
export const RANKING_PLACEHOLDERS = [
  "question",
  "participant_statement",
  "num_candidates",
  "candidate_statements",
] as const;
/** Accepted in ranking templates but not required. */
export const OPTIONAL_RANKING_PLACEHOLDERS = ["participant_num"] as const;

export type CandidatePlaceholder = (typeof CANDIDATE_PLACEHOLDERS)[number];
export type RankingPlaceholder =
  | (typeof RANKING_PLACEHOLDERS)[number]
  | (typeof OPTIONAL_RANKING_PLACEHOLDERS)[number];

export const DEFAULT_CANDIDATE_TEMPLATE = `Below are statements from participants answering the same question. Write one group statement that merges their views. Keep every point, concern, suggestion and question raised, even if the result gets long, and phrase it so most participants could accept it. Your reply is used word for word as the statement: no preamble, no closing remarks.

---
# {question}
---
{participant_statements}
---
`;

export const DEFAULT_RANKING_TEMPLATE = `Predict how the participant below would rank the group statements, from most preferred (1) to least preferred ({num_candidates}).

# {question}

## Participant {participant_num} wrote:
{participant_statement}

## Group statements:
{candidate_statements}

Judge each statement by how well it matches this participant's stance and priorities. Reply with a JSON object only:
{"ranking": [1, 2, ...]}
The list holds statement numbers starting at 1, never statement text.`;

export function fillTemplate(template: string, values: Readonly<Record<string, string | number>>): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? String(values[name]) : match,
  );
}

/** Required placeholders the template does not contain. */
export function missingPlaceholders(template: string, required: readonly string[]): string[] {
  return required.filter((name) => !template.includes(`{${name}}`));
}

export function formatParticipantStatements(statements: readonly string[]): string {
  return statements.map((s, i) => `Participant ${i + 1}: ${s}`).join("\n\n");
}

export function formatCandidateStatements(statements: readonly string[]): string {
  return statements.map((s, i) => `Statement ${i + 1}:\n${s}`).join("\n\n");
}

export function buildCandidatePrompt(template: string, question: string, statements: readonly string[]): string {
  return fillTemplate(template, {
    question,
    participant_statements: formatParticipantStatements(statements),
  } satisfies Record<CandidatePlaceholder, string>);
}

export interface RankingPromptInput {
  question: string;
  participantStatement: string;
  /** 1-based participant number shown to the model. */
  participantNum: number;
  candidates: readonly string[];
}

export function buildRankingPrompt(template: string, input: RankingPromptInput): string {
  return fillTemplate(template, {
    question: input.question,
    participant_statement: input.participantStatement,
    participant_num: input.participantNum,
    num_candidates: input.candidates.length,
    candidate_statements: formatCandidateStatements(input.candidates),
  } satisfies Record<RankingPlaceholder, string | number>);
}
