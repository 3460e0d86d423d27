export type ToolTextResponse = {
  content: [{ type: 'text'; text: string }];
  isError?: boolean;
};

export function toolTextResponse(text: string): ToolTextResponse {
  return {
    content: [{ type: 'text', text }],
  };
}

/** Text response flagged as a tool-level failure. */
export function toolErrorResponse(text: string): ToolTextResponse {
  return { ...toolTextResponse(text), isError: true };
}
