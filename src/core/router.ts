export type RouteDecision =
  | { type: "logout" }
  | { type: "command"; handler: string; payload: string }
  | { type: "message"; payload: string };

const COMMAND_PATTERN = /^\/([a-z][a-z0-9_-]*)(?:\s+([\s\S]*))?$/i;

export function routeTextInput(rawText: string, logoutKeyword = "logout"): RouteDecision {
  const text = rawText.trim();
  if (logoutKeyword && text.toLowerCase() === logoutKeyword.toLowerCase()) {
    return { type: "logout" };
  }
  const match = COMMAND_PATTERN.exec(text);
  if (match) {
    return { type: "command", handler: match[1].toLowerCase(), payload: (match[2] ?? "").trim() };
  }
  return { type: "message", payload: rawText };
}
