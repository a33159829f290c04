export type ChatTurn = {
  question: string;
  answer: string;
};

export const NO_HISTORY = "No previous conversation.";

export function formatHistory(history: ChatTurn[]): string {
  const lines: string[] = [];
  for (const turn of history) {
    if (turn.question) lines.push(`User: ${turn.question}`);
    if (turn.answer) lines.push(`Assistant: ${turn.answer}`);
  }
  return lines.length > 0 ? lines.join("\n") : NO_HISTORY;
}

/** Most recent turn with both a non-blank question and answer. */
export function lastInteraction(history: ChatTurn[]): ChatTurn | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const question = history[i].question.trim();
    const answer = history[i].answer.trim();
    if (question && answer) return { question, answer };
  }
  return undefined;
}
