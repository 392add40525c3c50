#!/usr/bin/env node
import "dotenv/config";
import blessed from "blessed";
import { createAppContext } from "./app-context.js";
import { COMMAND_HELP, parseChatCommand, type ChatCommand } from "./chat-commands.js";
import { loadConfig, type AppConfig } from "./rag/config.js";
import { formatSourcesForUI } from "./rag/context-builder.js";
import { ConfigError, errorMessage } from "./rag/errors.js";
import { initRagPipeline, type RagPipeline } from "./rag/pipeline.js";

// ── Config ──────────────────────────────────────────────────────────────────
let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
    console.error("  copy .env.example to .env and set OPENROUTER_API_KEY");
    process.exit(1);
  }
  throw err;
}

// ── State ───────────────────────────────────────────────────────────────────
const ctx = createAppContext(config, (msg) => logGrey(msg));
let busy = false;
let pipeline: RagPipeline | null = null;
let conversationId: string | null = null;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "scripture-rag",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: ` scripture-rag · ${config.corpus.title} `,
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " you > ",
  inputOnFocus: false,
  mouse: true,
});

screen.key(["C-c"], () => process.exit(0));
inputBox.key(["C-c"], () => process.exit(0));

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!busy) setTimeout(() => promptInput(), 0);
});

function logGrey(msg: string): void {
  chatBox.log(`{grey-fg}${blessed.escape(msg)}{/}`);
  screen.render();
}

chatBox.log("Ask a question below. /help lists commands. Ctrl+C to quit.");
chatBox.log("");
screen.render();

// ── Input Helpers ───────────────────────────────────────────────────────────
function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

// ── Spinner ─────────────────────────────────────────────────────────────────
const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
let spinIdx = 0;
let spinTimer: ReturnType<typeof setInterval> | null = null;
let spinElapsed = 0;
let spinLabel = "thinking";

function startSpinner(label: string): void {
  stopSpinner();
  spinLabel = label;
  spinIdx = 0;
  spinElapsed = 0;
  updateSpinnerLine();
  spinTimer = setInterval(() => {
    spinIdx = (spinIdx + 1) % spinFrames.length;
    spinElapsed += 100;
    updateSpinnerLine();
  }, 100);
}

function removeSpinnerLine(): void {
  const lines: string[] = chatBox.getLines();
  const last = lines[lines.length - 1];
  if (last !== undefined && last.includes(`${spinLabel}...`)) {
    chatBox.deleteLine(lines.length - 1);
  }
}

function updateSpinnerLine(): void {
  removeSpinnerLine();
  const secs = (spinElapsed / 1000).toFixed(1);
  chatBox.log(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
  screen.render();
}

function stopSpinner(): void {
  if (spinTimer) {
    clearInterval(spinTimer);
    spinTimer = null;
    removeSpinnerLine();
  }
}

// ── Chat Logic ──────────────────────────────────────────────────────────────
async function ensureConversation(): Promise<string> {
  if (!pipeline) throw new Error("Still preparing the verse index, try again shortly.");
  if (!conversationId) {
    conversationId = await ctx.conversations.create();
    logGrey(`  new conversation ${conversationId.slice(0, 8)}`);
  }
  return conversationId;
}

async function runTurn(userMessage: string): Promise<void> {
  const id = await ensureConversation();
  const active = pipeline;
  if (!active) return;

  const t0 = performance.now();
  let replyStart = -1;
  let fullReply = "";
  let reasoningStartedAt: number | null = null;

  startSpinner("gathering context");

  const result = await active.chat(id, userMessage, {
    onRetrieved(passages) {
      stopSpinner();
      if (passages.length > 0) {
        chatBox.log(`{grey-fg}  \u{2713} \u{1F4D6} ${blessed.escape(formatSourcesForUI(passages))}{/}`);
      } else {
        chatBox.log("{grey-fg}  no matching verses{/}");
      }
      startSpinner("thinking");
    },
    onReasoning() {
      reasoningStartedAt ??= performance.now();
    },
    onContent(delta) {
      if (replyStart < 0) {
        stopSpinner();
        if (reasoningStartedAt !== null) {
          const secs = ((performance.now() - t0) / 1000).toFixed(1);
          chatBox.log(`{grey-fg}  \u{2713} thought for ${secs}s{/}`);
        }
        replyStart = chatBox.getLines().length;
      }
      fullReply += delta;
      updateStreamingReply(replyStart, fullReply);
    },
  });

  stopSpinner();
  // Providers that ignore `stream` send the whole reply at once
  if (replyStart < 0) {
    updateStreamingReply(chatBox.getLines().length, result.answer);
  }
  if (!result.answer) {
    chatBox.log("{grey-fg}  (no reply){/}");
  }
}

function updateStreamingReply(fromLine: number, text: string): void {
  const current = chatBox.getLines().length;
  for (let i = current - 1; i >= fromLine; i--) {
    chatBox.deleteLine(i);
  }
  for (const line of text.split("\n")) {
    chatBox.log("  " + blessed.escape(line));
  }
  screen.render();
}

async function runCommand(command: ChatCommand): Promise<void> {
  switch (command.type) {
    case "message":
      return runTurn(command.text);

    case "help":
      for (const [usage, description] of COMMAND_HELP) {
        chatBox.log(`  {cyan-fg}${usage}{/}  ${description}`);
      }
      return;

    case "new":
      conversationId = await ctx.conversations.create(command.title ?? undefined);
      logGrey(`  new conversation ${conversationId.slice(0, 8)}`);
      return;

    case "list": {
      const conversations = await ctx.conversations.list();
      if (conversations.length === 0) {
        logGrey("  no conversations yet");
        return;
      }
      for (const c of conversations) {
        const marker = c.id === conversationId ? "*" : " ";
        const title = c.title ?? "(untitled)";
        logGrey(`${marker} ${c.id.slice(0, 8)}  ${title}  ${c.messageCount} msg  ${c.updatedAt}`);
      }
      return;
    }

    case "open": {
      const matches = (await ctx.conversations.list(Number.MAX_SAFE_INTEGER)).filter((c) =>
        c.id.startsWith(command.idPrefix),
      );
      const [match] = matches;
      if (!match || matches.length > 1) {
        throw new Error(
          matches.length > 1
            ? `"${command.idPrefix}" matches ${matches.length} conversations`
            : `No conversation starts with "${command.idPrefix}"`,
        );
      }
      const conversation = await ctx.conversations.get(match.id);
      if (!conversation) throw new Error(`Conversation ${match.id} disappeared`);
      conversationId = conversation.id;
      chatBox.log(`{grey-fg}── ${blessed.escape(conversation.title ?? conversation.id)} ──{/}`);
      for (const turn of conversation.turns) {
        const who = turn.role === "user" ? "{green-fg}you >{/}" : "{blue-fg}bot >{/}";
        chatBox.log(`${who} ${blessed.escape(turn.content)}`);
      }
      return;
    }

    case "title":
      if (!conversationId) throw new Error("No active conversation");
      await ctx.conversations.rename(conversationId, command.title);
      logGrey(`  renamed to "${command.title}"`);
      return;

    case "delete":
      if (!conversationId) throw new Error("No active conversation");
      await ctx.conversations.delete(conversationId);
      logGrey(`  deleted conversation ${conversationId.slice(0, 8)}`);
      conversationId = null;
      return;

    case "reindex":
      if (!pipeline) throw new Error("Still preparing the verse index, try again shortly.");
      startSpinner("re-indexing");
      try {
        await pipeline.reindex();
      } finally {
        stopSpinner();
      }
      return;

    case "health": {
      const health = pipeline?.health();
      logGrey(
        health
          ? `  index: ${health.index} (${health.indexedCount} verses), conversations: ${health.conversations}`
          : "  index: not initialized",
      );
      return;
    }

    case "unknown":
      throw new Error(`Unknown command /${command.name} (try /help)`);

    case "invalid":
      throw new Error(`Usage: ${command.usage}`);
  }
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (!text || busy) {
    promptInput();
    return;
  }

  const command = parseChatCommand(text);
  chatBox.log(
    command.type === "message"
      ? `{green-fg}you >{/} ${blessed.escape(text)}`
      : `{green-fg}>{/} ${blessed.escape(text)}`,
  );
  screen.render();
  busy = true;
  inputBox.style.border.fg = "grey";
  (inputBox as blessed.Widgets.BoxElement).setLabel(" ... ");
  screen.render();

  runCommand(command)
    .catch((err: unknown) => {
      stopSpinner();
      chatBox.log(`{red-fg}error:{/} ${blessed.escape(errorMessage(err))}`);
    })
    .finally(() => {
      busy = false;
      chatBox.log("");
      inputBox.style.border.fg = "green";
      (inputBox as blessed.Widgets.BoxElement).setLabel(" you > ");
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// ── RAG Initialization (non-blocking) ──────────────────────────────────────
initRagPipeline(ctx)
  .then((ready) => {
    pipeline = ready;
    chatBox.log("");
    screen.render();
  })
  .catch((err: unknown) => {
    screen.destroy();
    console.error(`Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  });

screen.render();
promptInput();
