import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TelegramApiError } from "../../shared/errors";
import { clampTelegramText, TelegramClient } from "../../telegram/telegram.client";
import type { FakeTelegramApi } from "../support/fakes";
import { silentLogger, startFakeTelegramApi } from "../support/fakes";

function client(api: FakeTelegramApi, waits: number[] = [], requestTimeoutMs?: number): TelegramClient {
  return new TelegramClient(
    "test-token",
    silentLogger,
    {
      requestTimeoutMs,
      sleep: async (ms: number) => {
        waits.push(ms);
      },
    },
    api.baseUrl,
  );
}

async function testJsonMethods(): Promise<void> {
  const api = await startFakeTelegramApi((call) => {
    if (call.method === "getMe") {
      return { json: { ok: true, result: { id: 1, is_bot: true, username: "track_test_bot" } } };
    }
    if (call.method === "sendMessage") {
      return { json: { ok: true, result: { message_id: 10, chat: { id: 5 } } } };
    }
    if (call.method === "getChatMember") {
      return { json: { ok: true, result: { status: "member", user: { id: 7 } } } };
    }
    return undefined;
  });

  try {
    const subject = client(api);
    assert.equal(subject.username, undefined);
    const me = await subject.getMe();
    await subject.getMe();
    assert.equal(me.username, "track_test_bot");
    assert.equal(subject.username, "track_test_bot");

    await subject.sendMessage(5, "hello", { replyToMessageId: 9, source: "test" });
    await subject.sendChatAction(5, "upload_document");
    const member = await subject.getChatMember("@track_news", 7);
    await subject.setWebhook("https://bot.example.test/telegram/webhook", "test-secret");
    await subject.deleteWebhook();

    assert.equal(member.status, "member");
    assert.deepEqual(
      api.calls.map((call) => call.method),
      ["getMe", "sendMessage", "sendChatAction", "getChatMember", "setWebhook", "deleteWebhook"],
    );
    assert.equal(api.calls[0].token, "bottest-token");
    assert.deepEqual(api.calls[1].body, {
      chat_id: 5,
      text: "hello",
      disable_web_page_preview: true,
      reply_to_message_id: 9,
      allow_sending_without_reply: true,
    });
    assert.deepEqual(api.calls[2].body, { chat_id: 5, action: "upload_document" });
    assert.deepEqual(api.calls[3].body, { chat_id: "@track_news", user_id: 7 });
    assert.deepEqual(api.calls[4].body, {
      url: "https://bot.example.test/telegram/webhook",
      allowed_updates: ["message"],
      secret_token: "test-secret",
    });
    assert.deepEqual(api.calls[5].body, { drop_pending_updates: false });
  } finally {
    await api.close();
  }
}

async function testRateLimitedMessageIsRetried(): Promise<void> {
  const api = await startFakeTelegramApi((_call, index) => {
    if (index === 0) {
      return {
        status: 429,
        json: {
          ok: false,
          error_code: 429,
          description: "Too Many Requests: retry after 1",
          parameters: { retry_after: 1 },
        },
      };
    }
    return { json: { ok: true, result: { message_id: 11, chat: { id: 5 } } } };
  });

  try {
    const waits: number[] = [];
    await client(api, waits).sendMessage(5, "again");
    assert.equal(api.calls.length, 2);
    assert.deepEqual(waits, [1_500]);
  } finally {
    await api.close();
  }
}

async function testApiErrors(): Promise<void> {
  const api = await startFakeTelegramApi((call) => {
    if (call.method === "getChatMember") {
      return { status: 400, json: { ok: false, error_code: 400, description: "Bad Request: chat not found" } };
    }
    if (call.method === "getUpdates") {
      return { status: 502, text: "<html>bad gateway</html>" };
    }
    return undefined;
  });

  try {
    const subject = client(api);
    await assert.rejects(subject.getChatMember("@missing_channel", 7), (error: unknown) => {
      assert.ok(error instanceof TelegramApiError);
      assert.equal(error.errorCode, 400);
      assert.equal(error.message, "Telegram API error (getChatMember): HTTP 400 Bad Request: chat not found");
      return true;
    });
    await assert.rejects(subject.getUpdates(3, 0), (error: unknown) => {
      assert.ok(error instanceof TelegramApiError);
      assert.equal(error.errorCode, 502);
      assert.equal(error.description, "non-JSON response");
      return true;
    });
    assert.deepEqual(api.calls[1].body, { timeout: 0, allowed_updates: ["message"], offset: 3 });
  } finally {
    await api.close();
  }
}

async function testSendAudioRebuildsFormOnRetry(): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "telegram-client-test-"));
  const filePath = path.join(dir, "song.mp3");
  await writeFile(filePath, "ID3-test-audio");

  const api = await startFakeTelegramApi((_call, index) => {
    if (index === 0) {
      return { status: 500, json: { ok: false, error_code: 500, description: "Internal Server Error" } };
    }
    return { json: { ok: true, result: { message_id: 12, chat: { id: 5 } } } };
  });

  try {
    const waits: number[] = [];
    const message = await client(api, waits).sendAudio({
      chatId: 5,
      filePath,
      title: "Test Track",
      performer: "Test Artist",
      durationSec: 62,
      caption: "Downloaded from: SoundCloud",
      replyToMessageId: 9,
    });

    assert.equal(message.message_id, 12);
    assert.deepEqual(waits, [1_000]);
    assert.equal(api.calls.length, 2);
    for (const call of api.calls) {
      assert.equal(call.method, "sendAudio");
      const raw = call.raw ?? "";
      assert.ok(raw.includes('name="chat_id"\r\n\r\n5\r\n'));
      assert.ok(raw.includes('filename="song.mp3"'));
      assert.ok(raw.includes("Content-Type: audio/mpeg\r\n\r\nID3-test-audio\r\n"));
      assert.ok(raw.includes('name="title"\r\n\r\nTest Track\r\n'));
      assert.ok(raw.includes('name="performer"\r\n\r\nTest Artist\r\n'));
      assert.ok(raw.includes('name="duration"\r\n\r\n62\r\n'));
      assert.ok(raw.includes('name="caption"\r\n\r\nDownloaded from: SoundCloud\r\n'));
      assert.ok(raw.includes('name="reply_to_message_id"\r\n\r\n9\r\n'));
    }
  } finally {
    await api.close();
    await rm(dir, { recursive: true, force: true });
  }
}

async function testStalledRequestTimesOutAndIsRetried(): Promise<void> {
  const api = await startFakeTelegramApi((call, index) => {
    if (call.method === "getUpdates") {
      return { delayMs: 150, json: { ok: true, result: [] } };
    }
    if (index === 0) {
      return { delayMs: 400, json: { ok: true, result: { message_id: 13, chat: { id: 5 } } } };
    }
    return { json: { ok: true, result: { message_id: 14, chat: { id: 5 } } } };
  });

  try {
    const waits: number[] = [];
    const subject = client(api, waits, 50);
    await subject.sendMessage(5, "stalled");
    assert.equal(api.calls.length, 2);
    assert.deepEqual(waits, [1_000]);

    // The long-poll window is added to the request limit.
    assert.deepEqual(await subject.getUpdates(undefined, 1), []);
  } finally {
    await api.close();
  }
}

function testClampTelegramText(): void {
  assert.equal(clampTelegramText("short"), "short");
  const clamped = clampTelegramText("a".repeat(4_000));
  assert.equal(clamped.length, 3_900);
  assert.equal(clamped.endsWith("a..."), true);
}

async function run(): Promise<void> {
  testClampTelegramText();
  await testJsonMethods();
  await testRateLimitedMessageIsRetried();
  await testApiErrors();
  await testSendAudioRebuildsFormOnRetry();
  await testStalledRequestTimesOutAndIsRetried();
  process.stdout.write("Telegram client integration tests passed.\n");
}

void run();
