/**
 * Prompts for query planning and reflection
 */

export function queryPlanPrompt(question: string, count: number, currentDate: string): string {
  return `You are planning web research.
Today's date is ${currentDate}.

Write at most ${count} distinct search queries that together cover the research question.
Prefer specific, keyword-rich queries. Do not repeat the same query with different wording.

Research question: ${question}

Respond with a JSON object:
{"rationale": "<why these queries>", "queries": [{"query": "<search query>", "rationale": "<what it covers>"}]}`;
}

export function reflectionPrompt(
  question: string,
  evidence: string,
  loopCount: number,
  currentDate: string
): string {
  return `You are reviewing research notes after ${loopCount} research round(s).
Today's date is ${currentDate}.

Research question: ${question}

Notes:
${evidence || '(no evidence gathered)'}

Decide whether the notes are sufficient to answer the question. If they are not,
describe the knowledge gap and write follow-up search queries that would close it.

Respond with a JSON object:
{"isSufficient": true|false, "knowledgeGap": "<what is missing>", "followUpQueries": ["<query>"]}`;
}

export function currentDate(): string {
  return new Date().toISOString().slice(0, 10);
}
