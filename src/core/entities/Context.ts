/**
 * Context handed to inference collaborators
 */
export type ContextRole = 'system' | 'user' | 'assistant' | (string & {});

export interface ContextEntry {
  role: ContextRole;
  content: string;
}
