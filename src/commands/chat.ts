import { LANGUAGE_NAMES, SUPPORTED_LANGS, type SupportedLang, isSupportedLang } from "../config.js";
import type { ChatMessage } from "../backend/types.js";
import type { RunContext } from "../core/context.js";
import { type LangOption, languageLabel, presentExplanation, resolveLanguage } from "../core/explain.js";
import { chatSystemPrompt } from "../core/prompts.js";
import { languageFlag } from "../ui/languages.js";
import { BackendError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("chat");

/** Conversation messages sent with each request, most recent last */
export const CHAT_CONTEXT_MESSAGES = 10;

const GOODBYE = "Goodbye! Happy coding!";

interface ChatSession {
  lang: SupportedLang;
  conversation: ChatMessage[];
}

type SlashOutcome = "continue" | "exit";

function printHelp(ctx: RunContext): void {
  const { c } = ctx.renderer;
  ctx.renderer.line();
  ctx.renderer.line(c.bold("Chat commands:"));
  ctx.renderer.line(`  ${c.cyan("/help")}         Show this help`);
  ctx.renderer.line(`  ${c.cyan("/lang [code]")}  Show or change the response language`);
  ctx.renderer.line(`  ${c.cyan("/clear")}        Forget the conversation so far`);
  ctx.renderer.line(`  ${c.cyan("/exit")}         Leave chat (also /quit, /q)`);
  ctx.renderer.line();
}

function handleSlash(ctx: RunContext, session: ChatSession, input: string): SlashOutcome {
  const [command = "", arg] = input.split(/\s+/);
  const { renderer } = ctx;

  switch (command.toLowerCase()) {
    case "/exit":
    case "/quit":
    case "/q":
      renderer.printSuccess(GOODBYE);
      return "exit";

    case "/help":
      printHelp(ctx);
      return "continue";

    case "/clear":
      session.conversation.length = 0;
      renderer.printSuccess("Conversation cleared");
      return "continue";

    case "/lang":
      if (!arg) {
        renderer.printInfo(`Current language: ${languageLabel(session.lang)}`);
        renderer.printInfo(`Available: ${SUPPORTED_LANGS.join(", ")}`);
      } else if (isSupportedLang(arg)) {
        session.lang = arg;
        renderer.printSuccess(`Language changed to ${languageLabel(arg)}`);
      } else {
        renderer.printError(`Unsupported language: ${arg}\nAvailable: ${SUPPORTED_LANGS.join(", ")}`);
      }
      return "continue";

    default:
      renderer.printError(`Unknown command: ${command}`);
      renderer.printInfo("Type /help for available commands");
      return "continue";
  }
}

async function reply(ctx: RunContext, session: ChatSession): Promise<string> {
  const backend = await ctx.backends.getBackend();
  const messages: ChatMessage[] = [
    { role: "system", content: chatSystemPrompt(LANGUAGE_NAMES[session.lang]) },
    ...session.conversation.slice(-CHAT_CONTEXT_MESSAGES),
  ];
  log.debug({ messages: messages.length }, "Sending chat turn");
  return backend.askMessages(messages);
}

/**
 * devexplain chat
 *
 * Reads lines until EOF, Ctrl-C or /exit. Backend failures are reported and
 * the turn is dropped; anything else ends the session.
 */
export async function runChat(ctx: RunContext, opts: LangOption = {}): Promise<void> {
  const session: ChatSession = { lang: resolveLanguage(ctx, opts.lang), conversation: [] };
  const { renderer } = ctx;
  const { c } = renderer;

  renderer.printBanner();
  renderer.printInfo(`Interactive Chat Mode ${languageLabel(session.lang)}`);
  renderer.printInfo("Type /help for commands, /exit to quit");
  renderer.line();

  const prompter = ctx.input.prompter();
  try {
    for (;;) {
      const raw = await prompter.ask(c.bold.green("You> "));
      if (raw === null) {
        renderer.line();
        renderer.printSuccess(GOODBYE);
        return;
      }

      const input = raw.trim();
      if (!input) continue;

      if (input.startsWith("/")) {
        if (handleSlash(ctx, session, input) === "exit") return;
        continue;
      }

      session.conversation.push({ role: "user", content: input });
      renderer.status(`Thinking ${languageFlag(session.lang)}...`);

      let answer: string;
      try {
        answer = await reply(ctx, session);
      } catch (err) {
        if (!(err instanceof BackendError)) throw err;
        renderer.printError(err.message);
        session.conversation.pop();
        continue;
      }

      session.conversation.push({ role: "assistant", content: answer });
      await presentExplanation(ctx, answer, "devexplain");
      await ctx.history.add("chat", input, answer, session.lang);
    }
  } finally {
    prompter.close();
  }
}
