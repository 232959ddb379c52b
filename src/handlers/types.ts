export type HandlerResponse =
  | { status: number; type: 'json'; body: object }
  | { status: number; type: 'text'; body: string }

/**
 * Reads the full request body as UTF-8 text
 */
export type BodyReader = () => Promise<string>

export function json(status: number, body: object): HandlerResponse {
  return { status, type: 'json', body }
}

export function text(status: number, body: string): HandlerResponse {
  return { status, type: 'text', body }
}
