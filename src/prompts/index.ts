/**
 * Prompt Library for the semantic content check
 *
 * The model grades machine-generated content for a given output type and
 * strictness level, and answers with a fixed JSON object. The structural
 * errors already found are passed along so the model does not re-report them.
 */

import { formatLoc } from '../engines/structural-validator.js';
import type { FieldError, SchemaDescription, ValidationLevel } from '../types/index.js';

/**
 * Everything a semantic service needs to grade one payload
 */
export interface SemanticPromptContext {
  validationType: string;
  validationLevel: ValidationLevel;
  payload: Record<string, unknown>;
  /** The schema description the payload was checked against */
  schema: SchemaDescription;
  /** Non-fatal structural errors (only present at strict level) */
  structuralErrors: FieldError[];
}

export const SEMANTIC_SYSTEM_PROMPT = `You are a validation assistant that reviews machine-generated output.

You judge whether content is fit for purpose: coherent, relevant to its stated type, internally consistent, and free of placeholder or filler text. You never rewrite the content; you grade it and explain what is wrong.

Always answer with a single JSON object and nothing else:

{
  "is_semantically_valid": boolean,
  "semantic_score": number between 0.0 and 1.0,
  "issues": ["short description of each problem"],
  "suggestions": ["one concrete fix per issue"]
}`;

const LEVEL_DEPTH: Record<ValidationLevel, string> = {
  basic: 'Check only that the content is coherent and complete. Ignore style and minor imprecision.',
  standard:
    'Check coherence, relevance to the output type, and internal consistency between fields.',
  strict:
    'Check coherence, relevance and internal consistency, plus factual plausibility and consistency across every field. Flag anything a careful reviewer would question.',
};

const TYPE_GUIDANCE: Record<string, string> = {
  generic: 'Check that the response is coherent, well-structured and appropriate.',
  recommendation:
    'Check that every recommendation is relevant, specific and actionable, and fits any user context given.',
  summary:
    'Check that the summary captures the key points of the original text without adding claims it does not make.',
  classification:
    'Check that the assigned categories fit the text, are justified, and that any probabilities agree with the categories.',
};

export function describeValidationType(validationType: string): string {
  return (
    TYPE_GUIDANCE[validationType] ??
    `Check that this ${validationType} output is coherent and serves its purpose.`
  );
}

/**
 * Builds the user prompt for one semantic assessment
 */
export function buildSemanticPrompt(context: SemanticPromptContext): string {
  const sections = [
    `## OUTPUT TYPE\n${context.validationType}`,
    `## STRICTNESS\n${context.validationLevel}: ${LEVEL_DEPTH[context.validationLevel]}`,
    `## WHAT TO CHECK\n${describeValidationType(context.validationType)}`,
    `## SCHEMA\n\`\`\`json\n${JSON.stringify(context.schema, null, 2)}\n\`\`\``,
    `## CONTENT\n\`\`\`json\n${JSON.stringify(context.payload, null, 2)}\n\`\`\``,
  ];

  if (context.structuralErrors.length > 0) {
    const listed = context.structuralErrors
      .map((error) => `- ${formatLoc(error.loc)}: ${error.msg}`)
      .join('\n');
    sections.push(
      `## KNOWN STRUCTURAL PROBLEMS\nThese were already reported; weigh them, but do not repeat them as issues:\n${listed}`
    );
  }

  sections.push('Respond with the JSON object only.');
  return sections.join('\n\n');
}

/**
 * Pull the JSON object out of a model reply, which may wrap it in a code
 * fence or surround it with prose.
 *
 * @throws {SyntaxError} If no parseable JSON object is present
 */
export function extractJsonObject(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  const body = fenced?.[1] ?? text;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new SyntaxError('No JSON object found in model reply');
  }
  return JSON.parse(body.slice(start, end + 1));
}
