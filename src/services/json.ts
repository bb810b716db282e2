/**
 * Pull the JSON object out of a model completion.
 * Models sometimes wrap the object in prose or code fences, so the span from
 * the first "{" to the last "}" is parsed. Throws SyntaxError when there is none.
 */
export function extractJsonObject(completion: string): unknown {
  const start = completion.indexOf('{');
  const end = completion.lastIndexOf('}');

  if (start === -1 || end < start) {
    throw new SyntaxError('Completion contains no JSON object');
  }

  return JSON.parse(completion.slice(start, end + 1));
}
