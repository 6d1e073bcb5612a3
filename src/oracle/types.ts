/**
 * Oracle boundary: the language model seen as an opaque function from
 * (instructions, input) to free text. Nothing structured is promised about
 * the returned text.
 */

export interface OracleCallOptions {
  signal?: AbortSignal;
}

export interface TextOracle {
  complete(systemInstruction: string, userText: string, options?: OracleCallOptions): Promise<string>;
}
