export const DETAILED_HELP = `mq — Model Query CLI

Common usage:
  mq add <shortname> <model> --provider <provider> [--sysprompt ... | --sysprompt-file PATH]
  mq models
  mq rm <shortname>
  mq ask <shortname> [-s/--sysprompt ...] [--json] [-n/--no-session] [--session <id>] "<query>"
  mq continue [--session <id>] [--json] "<query>"
  mq cont [--session <id>] [--json] "<query>"
  mq dump [--session <id>]
  mq test <shortname> <model> --provider <provider> [--save] [--json] "<query>"
  mq session list
  mq session select <id>
  mq session rename <old-id> <new-id>
  mq batch <shortname> [-i input.jsonl] [-o output.jsonl] [-w workers] [--extract-tags]

Notes:
  - Each \`mq ask\` creates a new session under ~/.mq/sessions/ unless -n/--no-session is used.
  - ~/.mq/last_conversation.json points at the latest session (symlink, or a file holding its id).
  - Set MQ_HOME to keep state somewhere other than ~/.mq.
  - If a provider returns a reasoning trace, mq prints it before the response with a \`response:\` header.
  - --json prints a single-line JSON object including at least \`response\` and \`prompt\`.
  - \`mq test\` validates a provider/model; it only saves the alias when --save is provided.
  - \`mq batch\` reads JSON lines with a "prompt" field and writes one result line per input
    line, in input order. A file given with -o appears only once the whole batch succeeded.
  - API keys are read from the environment (OPENAI_API_KEY, ANTHROPIC_API_KEY, ...) or a .env file.

Examples:
  mq add gpt gpt-4o-mini --provider openai
  mq ask gpt "Write a haiku about recursive functions"
  mq ask -n gpt "quick question"
  mq continue "Make it funnier"
  mq test gpt gpt-4o-mini --provider openai "hello"
  mq test gpt gpt-4o-mini --provider openai --save "hello"
  mq session list
  mq continue --session <id> "follow up"
  mq batch gpt -i prompts.jsonl -o results.jsonl -w 8 --prefix "Summarize: "

More:
  mq help <command>   # usage for a specific command
  mq --help           # short help
`;
