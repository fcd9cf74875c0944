export function normalizePostedBody(body: string): string {
  return body.replace(/\r\n/g, "\n").replace(/\\r\\n/g, "\n").trim();
}
