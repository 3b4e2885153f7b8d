export { RELEVANCE_SYSTEM_PROMPT, RELEVANCE_USER_TEMPLATE } from './relevance';
