import { RELEVANCE_SYSTEM_PROMPT, RELEVANCE_USER_TEMPLATE } from './prompts';
import type { PaperRecord } from './schemas';
import type { TopicQuery } from '../pipeline/types';

export interface RelevancePrompt {
  systemMessage: string;
  userMessage: string;
}

const PLACEHOLDER_PATTERN = /\{\{([a-z_]+)\}\}/g;

/**
 * Fills `{{name}}` placeholders in a single pass over the template. Values
 * are inserted verbatim and never scanned again, so a title that happens to
 * contain `{{paper_abstract}}` stays as written. Unknown placeholders are
 * left untouched.
 */
export function renderTemplate(template: string, values: ReadonlyMap<string, string>): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string) => values.get(name) ?? match);
}

export function buildRelevancePrompt(topic: TopicQuery, paper: PaperRecord): RelevancePrompt {
  const values = new Map<string, string>([
    ['topic_description', topic.description],
    ['paper_title', paper.title],
    ['paper_venue', topic.venue],
    ['paper_year', topic.year],
    ['paper_abstract', paper.abstract],
  ]);

  return {
    systemMessage: RELEVANCE_SYSTEM_PROMPT,
    userMessage: renderTemplate(RELEVANCE_USER_TEMPLATE, values),
  };
}
