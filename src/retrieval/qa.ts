// ============================================
// Retrieval QA — map-reduce answering over retrieved documents
// ============================================

import type { Document } from "../documents/types.js";
import type { ChatModel } from "../llm/client.js";
import { buildCombinePrompt, buildQuestionPrompt, NO_DOCUMENTS_FOUND } from "../llm/prompts.js";

/**
 * Ask the question of each document separately, then answer
 * from the extracts. No documents means no model calls.
 */
export async function answerFromDocuments(model: ChatModel, question: string, documents: Document[]): Promise<string> {
  if (documents.length === 0) {
    return NO_DOCUMENTS_FOUND;
  }

  const extracts = await Promise.all(
    documents.map((document) =>
      model.complete({
        messages: [
          { role: "system", content: buildQuestionPrompt(document.content) },
          { role: "user", content: question },
        ],
      })
    )
  );

  const answer = await model.complete({
    messages: [
      { role: "system", content: buildCombinePrompt(extracts.map((extract) => extract.content)) },
      { role: "user", content: question },
    ],
  });

  return answer.content;
}
