export type ApiService = 'Alegra' | 'Graph' | 'Azure AD';

/**
 * Non-2xx response from one of the remote APIs.
 * The message keeps the `<Service> API error: <status> - <body>` shape used in the logs.
 */
export class ApiError extends Error {
  constructor(
    readonly service: ApiService,
    readonly status: number,
    readonly body: string
  ) {
    super(`${service} API error: ${status} - ${body.substring(0, 500)}`);
    this.name = 'ApiError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
