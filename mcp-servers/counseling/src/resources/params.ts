import { errorResult, ValidationError } from "../errors.js";

/** A URI template variable, decoded. Repeated variables keep their first value. */
export function templateParam(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? value[0] : value;
  try {
    return decodeURIComponent(raw ?? "");
  } catch (err) {
    if (!(err instanceof URIError)) throw err;
    throw new ValidationError(`Malformed URI parameter "${raw ?? ""}".`);
  }
}

/** Resource contents carrying `{ error }` in place of the requested data. */
export function errorContents(uri: URL, err: unknown) {
  const [message] = errorResult(err).content;
  return { contents: [{ uri: uri.href, text: JSON.stringify({ error: message?.text ?? "Error" }) }] };
}
