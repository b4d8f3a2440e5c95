export const TELEGRAM_TRANSPORT: unique symbol = Symbol('TELEGRAM_TRANSPORT');
export const TELEGRAM_FETCH: unique symbol = Symbol('TELEGRAM_FETCH');

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
