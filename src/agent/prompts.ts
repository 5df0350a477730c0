/**
 * @fileoverview Prompt construction for the reasoning loop.
 *
 * The prompt is a single string: system instructions listing the tools, one
 * worked example, optional conversation context, the question and the
 * transcript so far. It ends with `Thought:` so the model continues in the
 * expected format.
 *
 * @module campus-guide/agent/prompts
 */

import type { ToolDefinition } from '../types/tools.types.js';
import type { Transcript, TranscriptStep } from '../types/transcript.types.js';
import { MalformedReason } from '../types/transcript.types.js';
import { DATABASE_QUERY_TOOL, WEB_SEARCH_TOOL } from '../types/core.types.js';

/**
 * One message of a previous exchange, passed for follow-up questions.
 */
export interface ConversationTurn {
  readonly role: 'user' | 'assistant';
  readonly content: string;
}

export const MAX_CONTEXT_TURN_LENGTH = 200;

export interface PromptInput {
  readonly tools: ReadonlyArray<ToolDefinition>;
  readonly transcript: Transcript;
  readonly context: ReadonlyArray<ConversationTurn>;
  readonly institution: string | null;
}

export function buildSystemPrompt(
  tools: ReadonlyArray<ToolDefinition>,
  institution: string | null,
): string {
  const name = institution ?? 'the university';
  const toolLines = tools.map(tool => `- ${tool.id}: ${tool.description}`).join('\n');

  return `You are a helpful virtual assistant for ${name} students. You answer questions about courses, prerequisites, programs, deadlines and campus resources using the Thought/Action/Observation format.

You have access to the following tools:
${toolLines}

Use this format:

Thought: Consider what information you need to answer the question
Action: [tool_name]
Action Input: [input for the tool]
Observation: [result from the tool]
... (repeat Thought/Action/Observation as needed)
Thought: I now have enough information to answer
Final Answer: [your complete answer to the user]

RULES:
1. ALWAYS use ${DATABASE_QUERY_TOOL} FIRST for questions about courses, prerequisites, programs, deadlines or campus resources.
2. Write only ONE Action per response and stop. Never write an Observation yourself; it is provided to you.
3. If ${DATABASE_QUERY_TOOL} reports that nothing was found, use ${WEB_SEARCH_TOOL} next.
4. When an Observation contains the answer, your Final Answer MUST use its exact wording. Do not change course codes, dates or requirements.
5. Do not add any information that is not in an Observation.
6. The >>> MOST RELEVANT ANSWER >>> marker shows the best result; use that information.
7. If every tool fails, say that you could not find the information and suggest contacting the relevant office.
8. For greetings or thanks you may give a Final Answer directly.`;
}

const FEW_SHOT_EXAMPLE = `Here is an example of how to answer a question:

Question: What are the prerequisites for CMPE 259?

Thought: I need the prerequisites for CMPE 259. I should query the database first.
Action: ${DATABASE_QUERY_TOOL}
Action Input: CMPE 259 prerequisites
Observation: >>> MOST RELEVANT ANSWER >>> Result 1 [academics] (relevance: 0.95):
CMPE 259 - Natural Language Processing: Prerequisites: CMPE 252 or CMPE 255 or CMPE 257, or instructor consent.
Thought: I found the prerequisites in the database. I will give the exact information.
Final Answer: The prerequisites for CMPE 259 (Natural Language Processing) are: CMPE 252 or CMPE 255 or CMPE 257, or instructor consent.

---
Now answer the following question the same way.`;

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function renderContext(context: ReadonlyArray<ConversationTurn>): string {
  if (context.length === 0) {
    return '';
  }

  const lines = context.map(turn => {
    const role = turn.role === 'user' ? 'User' : 'Assistant';
    return `${role}: ${truncate(turn.content, MAX_CONTEXT_TURN_LENGTH)}`;
  });
  return `Recent conversation for context:\n${lines.join('\n')}\n\n`;
}

function renderStep(step: TranscriptStep): string {
  switch (step.kind) {
    case 'user_query':
      return `Question: ${step.text}\n`;
    case 'thought':
      return `Thought: ${step.text}`;
    case 'action':
      return `Action: ${step.toolName}\nAction Input: ${step.toolInput}`;
    case 'observation':
      return `Observation: ${step.text}\n`;
    case 'final_answer':
      return `Final Answer: ${step.text}`;
  }
}

/**
 * Renders the full prompt for the next completion call.
 */
export function buildPrompt(input: PromptInput): string {
  const steps = input.transcript.map(renderStep).join('\n');

  return [
    buildSystemPrompt(input.tools, input.institution),
    '',
    FEW_SHOT_EXAMPLE,
    '',
    `${renderContext(input.context)}${steps}`,
    'Thought:',
  ].join('\n');
}

/**
 * Instruction appended when a completion could not be used.
 */
export function correctiveMessage(
  reason: MalformedReason,
  detail: string | null,
  toolNames: ReadonlySet<string>,
): string {
  const available = [...toolNames].join(', ');

  switch (reason) {
    case MalformedReason.EMPTY:
    case MalformedReason.NO_MARKER:
      return `Your response did not follow the required format. Respond with "Action:" and "Action Input:" to use a tool (${available}), or with "Final Answer:".`;
    case MalformedReason.UNKNOWN_TOOL:
      return `Unknown tool "${detail ?? ''}". Available tools: ${available}.`;
    case MalformedReason.MISSING_INPUT:
      return `The Action for ${detail ?? 'the tool'} had no input. Write the search text after "Action Input:".`;
    case MalformedReason.EMPTY_ANSWER:
      return 'Your Final Answer was empty. Write the answer after "Final Answer:".';
    case MalformedReason.UNGROUNDED_ANSWER:
      return `You must not answer before consulting a tool. Use ${DATABASE_QUERY_TOOL} first.`;
  }
}

/**
 * Observation for a web search requested after the database already answered.
 */
export const AUTHORITATIVE_LOOKUP_MESSAGE =
  `The ${DATABASE_QUERY_TOOL} result above is the official answer. Do not search the web; give your Final Answer using the exact wording of that result.`;
