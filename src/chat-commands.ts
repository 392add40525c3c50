export type ChatCommand =
  | { type: "message"; text: string }
  | { type: "help" }
  | { type: "new"; title: string | null }
  | { type: "list" }
  | { type: "open"; idPrefix: string }
  | { type: "title"; title: string }
  | { type: "delete" }
  | { type: "reindex" }
  | { type: "health" }
  | { type: "unknown"; name: string }
  | { type: "invalid"; name: string; usage: string };

export const COMMAND_HELP: ReadonlyArray<readonly [string, string]> = [
  ["/new [title]", "start a new conversation"],
  ["/list", "list recent conversations"],
  ["/open <id>", "switch to a conversation (id prefix is enough)"],
  ["/title <text>", "rename the current conversation"],
  ["/delete", "delete the current conversation"],
  ["/reindex", "rebuild the verse index from the corpus"],
  ["/health", "show index and store status"],
  ["/help", "show this help"],
];

export function parseChatCommand(input: string): ChatCommand {
  const text = input.trim();
  if (!text.startsWith("/")) return { type: "message", text };

  const [head = "", ...rest] = text.slice(1).split(/\s+/);
  const name = head.toLowerCase();
  const arg = rest.join(" ").trim();

  switch (name) {
    case "help":
      return { type: "help" };
    case "new":
      return { type: "new", title: arg || null };
    case "list":
      return { type: "list" };
    case "open":
      return arg
        ? { type: "open", idPrefix: arg }
        : { type: "invalid", name, usage: "/open <id>" };
    case "title":
      return arg
        ? { type: "title", title: arg }
        : { type: "invalid", name, usage: "/title <text>" };
    case "delete":
      return { type: "delete" };
    case "reindex":
      return { type: "reindex" };
    case "health":
      return { type: "health" };
    default:
      return { type: "unknown", name };
  }
}
