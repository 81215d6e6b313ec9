/**
 * Directive grammar spoken by the chat client:
 *
 *   @portfolios                      list saved snapshots
 *   @<filename>                      read one snapshot
 *   /prompts                         list prompt templates
 *   /prompt <name> key=value ...     invoke a template (values may be "quoted")
 *   /status                          session guardrail status
 *
 * Anything else is a free-text query.
 */

export const RESOURCE_SCHEME = "finance://";

export type QueryDirective =
  | { kind: "list_resources"; uri: string }
  | { kind: "read_resource"; filename: string; uri: string }
  | { kind: "list_prompts" }
  | { kind: "invoke_prompt"; name: string; arguments: Record<string, string> }
  | { kind: "status" }
  | { kind: "query"; text: string }
  | { kind: "invalid"; error: string };

const PROMPT_TOKEN = /(\w+)=(?:"([^"]*)"|(\S+))|(\S+)/g;

export function parsePromptCommand(command: string): QueryDirective {
  const args: Record<string, string> = {};
  let name: string | undefined;

  for (const match of command.matchAll(PROMPT_TOKEN)) {
    const [, key, quoted, bare, word] = match;
    if (key !== undefined) {
      args[key] = quoted ?? bare ?? "";
    } else if (word !== undefined && name === undefined) {
      name = word;
    }
  }

  if (!name || !/^\w+$/.test(name)) {
    return { kind: "invalid", error: "Invalid prompt format. Use: /prompt <name> <arg1=value1>" };
  }
  return { kind: "invoke_prompt", name, arguments: args };
}

export function parseQueryDirective(input: string): QueryDirective {
  const query = input.trim();

  if (query.startsWith("@")) {
    const target = query.slice(1).trim();
    if (target === "") return { kind: "invalid", error: "Resource name is required after @" };
    if (target === "portfolios") return { kind: "list_resources", uri: `${RESOURCE_SCHEME}portfolios` };
    return { kind: "read_resource", filename: target, uri: `${RESOURCE_SCHEME}${target}` };
  }

  if (query === "/prompts") return { kind: "list_prompts" };
  if (query === "/status") return { kind: "status" };
  if (query === "/prompt" || query.startsWith("/prompt ")) {
    return parsePromptCommand(query.slice("/prompt".length));
  }

  return { kind: "query", text: query };
}
