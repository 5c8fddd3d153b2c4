/**
 * Turns a parsed payload into a typed message, throwing when it does not fit.
 * Zod schemas satisfy this interface as they are.
 */
export interface Decoder<T> {
  parse(data: unknown): T;
}
