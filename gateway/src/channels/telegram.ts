import type {
  CompanionService,
  CompanionTransport,
} from "../companion-service.js";
import {
  resolveTypingLimits,
  typingDelayMs,
  type OutboundDelivery,
  type TypingLimits,
} from "../pacing.js";

interface TelegramApiResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
  parameters?: {
    retry_after?: number;
  };
}

interface TelegramUser {
  id: number;
  username?: string;
  first_name?: string;
}

interface TelegramChat {
  id: number;
  type: string;
}

export interface TelegramMessage {
  message_id: number;
  date: number;
  from?: TelegramUser;
  chat: TelegramChat;
  text?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

export interface TelegramMe {
  id: number;
  is_bot: boolean;
  first_name: string;
  username?: string;
}

/** The four Bot API calls the channel makes. */
export interface TelegramBotApi {
  getMe(): Promise<TelegramMe>;
  getUpdates(offset: number, timeoutSec: number): Promise<TelegramUpdate[]>;
  sendMessage(chatId: number, text: string): Promise<void>;
  sendChatAction(chatId: number, action: "typing"): Promise<void>;
}

export interface TelegramChannelConfig {
  enabled: boolean;
  botToken?: string;
  ownerUserId?: number;
  ownerChatId?: number;
  pollTimeoutSec: number;
  retryBaseMs: number;
  retryMaxMs: number;
  personaName: string;
}

export interface TelegramChannelOptions {
  api?: TelegramBotApi;
  sleep?: (ms: number) => Promise<void>;
  typingLimits?: TypingLimits;
}

export interface TelegramChannelStatus {
  enabled: boolean;
  running: boolean;
  connected: boolean;
  ownerUserId?: number;
  ownerChatId?: number;
  botUsername?: string;
  lastUpdateId?: number;
  lastErrorAt?: string;
  lastError?: string;
}

const TELEGRAM_MAX_MESSAGE = 3900;

/**
 * Bot API over HTTPS with fetch.
 */
export class HttpTelegramApi implements TelegramBotApi {
  constructor(private readonly token: string) {}

  async getMe(): Promise<TelegramMe> {
    return await this.call<TelegramMe>("getMe", {});
  }

  async getUpdates(offset: number, timeoutSec: number): Promise<TelegramUpdate[]> {
    return await this.call<TelegramUpdate[]>("getUpdates", {
      offset,
      timeout: timeoutSec,
      allowed_updates: ["message"],
    });
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
    });
  }

  async sendChatAction(chatId: number, action: "typing"): Promise<void> {
    await this.call("sendChatAction", { chat_id: chatId, action });
  }

  private async call<T>(method: string, payload: Record<string, unknown>): Promise<T> {
    const response = await fetch(
      `https://api.telegram.org/bot${this.token}/${method}`,
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
      },
    );
    const data = (await response.json()) as TelegramApiResponse<T>;
    if (!response.ok || !data.ok || data.result === undefined) {
      const retryAfter = data.parameters?.retry_after;
      if (typeof retryAfter === "number" && retryAfter > 0) {
        await waitMs(retryAfter * 1000);
      }
      throw new Error(
        `Telegram API ${method} failed: ${
          data.description || response.statusText || "unknown error"
        }`,
      );
    }

    return data.result;
  }
}

export class TelegramChannel implements CompanionTransport {
  private running = false;
  private connected = false;
  private lastUpdateId = 0;
  private lastErrorAt: string | undefined;
  private lastError: string | undefined;
  private botUsername: string | undefined;
  private pollPromise: Promise<void> | undefined;
  private readonly api: TelegramBotApi | null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly typingLimits: TypingLimits;

  constructor(
    private readonly config: TelegramChannelConfig,
    private readonly companion: CompanionService,
    options: TelegramChannelOptions = {},
  ) {
    this.api =
      options.api ?? (config.botToken ? new HttpTelegramApi(config.botToken) : null);
    this.sleep = options.sleep ?? waitMs;
    this.typingLimits = options.typingLimits ?? resolveTypingLimits();
  }

  async start(): Promise<void> {
    if (!this.config.enabled) {
      console.log("📨 Telegram channel disabled");
      this.lastError = undefined;
      this.lastErrorAt = undefined;
      return;
    }
    const api = this.api;
    if (!api) {
      this.setStartupError(
        "missing_telegram_bot_token",
        "⚠️ Telegram is enabled but TELEGRAM_BOT_TOKEN is missing. Set it in ~/.kindred/.env and restart the daemon.",
      );
      return;
    }
    if (!this.config.ownerUserId && !this.config.ownerChatId) {
      this.setStartupError(
        "missing_telegram_owner_id",
        "⚠️ Telegram is enabled but owner IDs are not configured. Set telegram.ownerUserId in ~/.kindred/config.json and restart the daemon.",
      );
      return;
    }
    if (this.running) return;

    try {
      const me = await api.getMe();
      this.botUsername = me.username;
      this.connected = true;
      this.running = true;
      this.lastError = undefined;
      this.lastErrorAt = undefined;
      console.log(
        `📨 Telegram channel started (${this.botUsername || "unknown-bot"})`,
      );
      this.pollPromise = this.pollLoop(api);
    } catch (error) {
      const maskedToken = maskToken(this.config.botToken);
      this.setStartupError(
        "telegram_getme_validation_failed",
        `⚠️ Telegram bot validation failed for token ${maskedToken}: ${
          error instanceof Error ? error.message : "unknown error"
        }.`,
      );
    }
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.pollPromise) {
      await this.pollPromise.catch((error) => {
        console.error("telegram poll shutdown error:", error);
      });
      this.pollPromise = undefined;
    }
    this.connected = false;
  }

  getStatus(): TelegramChannelStatus {
    return {
      enabled: this.config.enabled,
      running: this.running,
      connected: this.connected,
      ownerUserId: this.config.ownerUserId,
      ownerChatId: this.config.ownerChatId,
      botUsername: this.botUsername,
      lastUpdateId: this.lastUpdateId || undefined,
      lastErrorAt: this.lastErrorAt,
      lastError: this.lastError,
    };
  }

  /**
   * Send a proactive delivery to the owner's chat with typing pauses.
   * Resolves to false when the channel is not connected.
   */
  async deliver(outbound: OutboundDelivery): Promise<boolean> {
    const chatId = this.config.ownerChatId ?? this.config.ownerUserId;
    if (!this.api || !this.running || chatId === undefined) return false;
    if (outbound.messages.length === 0) return false;

    await this.sendPaced(chatId, outbound);
    console.log(
      JSON.stringify({
        type: "telegram_delivery",
        chat_id: chatId,
        message_count: outbound.messages.length,
        delay_class: outbound.pacing.delayClass,
      }),
    );
    return true;
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const api = this.api;
    const message = update.message;
    const text = message?.text?.trim();
    if (!api || !message || !text) return;

    const chatId = message.chat.id;
    const fromUserId = message.from?.id;
    if (!this.isAuthorized(chatId, fromUserId)) {
      await api.sendMessage(chatId, "This bot only talks to its owner.");
      console.log(
        JSON.stringify({
          type: "telegram_update",
          auth_result: "denied",
          chat_id: chatId,
          update_id: update.update_id,
        }),
      );
      return;
    }

    const command = parseCommand(text);
    if (command === "/start") {
      await api.sendMessage(
        chatId,
        `${this.config.personaName} is here. Just write whenever you like.`,
      );
      return;
    }
    if (command === "/help") {
      await api.sendMessage(
        chatId,
        "Commands:\n/start - confirm the bot is ready\n/help - show help\n/state - what I'm up to right now",
      );
      return;
    }
    if (command === "/state") {
      await api.sendMessage(chatId, this.companion.describeState());
      return;
    }

    const startedAt = performance.now();
    const stopThinking = this.startThinkingIndicator(api, chatId);
    try {
      const reply = await this.companion.handleUserMessage(text);
      stopThinking();
      await this.sendPaced(chatId, reply);
      console.log(
        JSON.stringify({
          type: "telegram_update",
          auth_result: "allowed",
          chat_id: chatId,
          update_id: update.update_id,
          message_count: reply.messages.length,
          memory_path: reply.memoryPath,
          time_total_ms: Number((performance.now() - startedAt).toFixed(1)),
        }),
      );
    } catch (error) {
      console.error("telegram message handling error:", error);
      await api.sendMessage(chatId, "Sorry, my head is elsewhere. Give me a minute?");
    } finally {
      stopThinking();
    }
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private async pollLoop(api: TelegramBotApi): Promise<void> {
    let retryMs = this.config.retryBaseMs;
    while (this.running) {
      try {
        const updates = await api.getUpdates(
          this.lastUpdateId + 1,
          this.config.pollTimeoutSec,
        );
        for (const update of updates) {
          this.lastUpdateId = Math.max(this.lastUpdateId, update.update_id);
          await this.handleUpdate(update);
        }
        retryMs = this.config.retryBaseMs;
      } catch (error) {
        this.lastErrorAt = new Date().toISOString();
        this.lastError = error instanceof Error ? error.message : "Unknown error";
        console.error("telegram poll error:", error);
        await this.sleep(retryMs);
        retryMs = Math.min(this.config.retryMaxMs, retryMs * 2);
      }
    }
  }

  private async sendPaced(chatId: number, outbound: OutboundDelivery): Promise<void> {
    const api = this.api;
    if (!api) return;

    for (let i = 0; i < outbound.messages.length; i++) {
      const text = outbound.messages[i];
      if (i > 0) await this.sleep(this.typingLimits.pauseMs);
      await api.sendChatAction(chatId, "typing").catch((error) => {
        console.warn("telegram typing indicator failed:", error);
      });
      await this.sleep(
        typingDelayMs(text, outbound.pacing.delayClass, this.typingLimits),
      );
      for (const chunk of splitTelegramMessage(text, TELEGRAM_MAX_MESSAGE)) {
        await api.sendMessage(chatId, chunk);
      }
    }
  }

  private isAuthorized(chatId: number, fromUserId?: number): boolean {
    const ownerUserId = this.config.ownerUserId;
    const ownerChatId = this.config.ownerChatId;
    const byUser = ownerUserId ? fromUserId === ownerUserId : false;
    const byChat = ownerChatId ? chatId === ownerChatId : false;
    return byUser || byChat;
  }

  private startThinkingIndicator(api: TelegramBotApi, chatId: number): () => void {
    let active = true;
    const emit = () => {
      if (!active) return;
      api.sendChatAction(chatId, "typing").catch((error) => {
        console.warn("telegram typing indicator failed:", error);
      });
    };
    emit();
    const timer = setInterval(emit, 4500);
    return () => {
      active = false;
      clearInterval(timer);
    };
  }

  private setStartupError(code: string, message: string): void {
    this.running = false;
    this.connected = false;
    this.lastErrorAt = new Date().toISOString();
    this.lastError = code;
    console.warn(message);
  }
}

function parseCommand(text: string): string | null {
  const firstToken = text.split(/\s+/)[0];
  if (!firstToken.startsWith("/")) return null;
  const [command] = firstToken.split("@");
  return command.toLowerCase();
}

export function splitTelegramMessage(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];
  const chunks: string[] = [];
  let cursor = 0;
  while (cursor < text.length) {
    let end = Math.min(cursor + maxLength, text.length);
    if (end < text.length) {
      const newline = text.lastIndexOf("\n", end);
      if (newline > cursor + 500) {
        end = newline;
      }
    }
    chunks.push(text.slice(cursor, end).trim());
    cursor = end;
  }
  return chunks.filter(Boolean);
}

async function waitMs(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export function maskToken(token?: string): string {
  if (!token) return "(not set)";
  if (token.length <= 10) return "*".repeat(token.length);
  return `${token.slice(0, 6)}...${token.slice(-4)}`;
}
