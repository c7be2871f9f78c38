import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { CommandRouter } from "../../router/command.router";
import { buildUpdateDispatcher } from "../../router/dispatch/update.dispatcher";
import type { UpdateRouter } from "../../router/dispatch/update.dispatcher";
import { UserCooldown } from "../../shared/utils/cooldown";
import { UpdateDeduplicator } from "../../shared/utils/telegram-idempotency";
import { AudioSender } from "../../tracks/audio-sender";
import { SubscriptionService } from "../../tracks/subscription.service";
import { TrackRequestService } from "../../tracks/track-request.service";
import {
  BOT_USERNAME,
  FakeAudioUploader,
  FakeTrackDownloader,
  RecordingMessenger,
  silentLogger,
  textUpdate,
} from "../support/fakes";

const WELCOME = [
  "Hi! Send me a link to a track and I will reply with the MP3.",
  "",
  "Supported sources: soundcloud.com",
  "You can also send a track or artist name and I will search for it.",
  "",
  "Examples:",
  "• https://soundcloud.com/artist/track",
  "• /check: check your subscription",
].join("\n");

const WELCOME_WITH_CHANNEL = [
  "Hi! Send me a link to a track and I will reply with the MP3.",
  "",
  "Supported sources: soundcloud.com",
  "You can also send a track or artist name and I will search for it.",
  "",
  "To receive files, subscribe to @track_news.",
  "",
  "Examples:",
  "• https://soundcloud.com/artist/track",
  "• /check: check your subscription",
].join("\n");

function buildStack(tempDir: string, requiredChannel?: string) {
  const messenger = new RecordingMessenger();
  const downloader = new FakeTrackDownloader();
  const uploader = new FakeAudioUploader();
  const subscriptions = new SubscriptionService(messenger, silentLogger, requiredChannel);
  const trackRequests = new TrackRequestService(
    messenger,
    downloader,
    new AudioSender(uploader, 45, silentLogger),
    subscriptions,
    new UserCooldown(0),
    { allowedDomains: ["soundcloud.com"], searchEnabled: true, tempDir, maxFileMb: 45 },
    silentLogger,
  );
  const router = new CommandRouter(
    messenger,
    trackRequests,
    subscriptions,
    { allowedDomains: ["soundcloud.com"], searchEnabled: true },
    silentLogger,
  );
  const dispatcher = buildUpdateDispatcher({
    router,
    deduplicator: new UpdateDeduplicator(),
    logger: silentLogger,
    concurrency: 1,
    botUsername: () => BOT_USERNAME,
  });
  return { messenger, downloader, uploader, dispatcher };
}

async function testCommandsAndDuplicates(tempDir: string): Promise<void> {
  const { messenger, downloader, uploader, dispatcher } = buildStack(tempDir);

  await dispatcher.submit(textUpdate(1, "/start"));
  await dispatcher.submit(textUpdate(1, "/start"));
  await dispatcher.submit(textUpdate(2, "/start@other_bot"));
  await dispatcher.submit(textUpdate(3, "/dance"));
  await dispatcher.submit(textUpdate(4, undefined));
  await dispatcher.submit(textUpdate(5, `/check@${BOT_USERNAME}`));

  assert.deepEqual(messenger.messages, [
    { chatId: 100, text: WELCOME, replyToMessageId: undefined },
    { chatId: 100, text: "Unknown command. Send /help to see what I can do.", replyToMessageId: 103 },
    { chatId: 100, text: "Please send a track link as a text message.", replyToMessageId: 104 },
    { chatId: 100, text: "No subscription is required to use this bot.", replyToMessageId: 105 },
  ]);

  await dispatcher.submit(textUpdate(6, "https://soundcloud.com/artist/track"));
  assert.equal(downloader.calls.length, 1);
  assert.equal(uploader.uploads.length, 1);
  assert.equal(uploader.uploads[0].replyToMessageId, 106);
  assert.equal(dispatcher.pendingCount, 0);
}

async function testCheckWithRequiredChannel(tempDir: string): Promise<void> {
  const { messenger, dispatcher } = buildStack(tempDir, "@track_news");

  await dispatcher.submit(textUpdate(1, "/help"));
  messenger.memberStatus = "administrator";
  await dispatcher.submit(textUpdate(2, "/check"));
  messenger.memberStatus = "kicked";
  await dispatcher.submit(textUpdate(3, "/check"));
  messenger.memberError = new Error("Bad Request: chat not found");
  await dispatcher.submit(textUpdate(4, "/check"));

  assert.deepEqual(messenger.texts(), [
    WELCOME_WITH_CHANNEL,
    "Subscription to @track_news: ✅ yes",
    "Subscription to @track_news: ❌ no",
    "I cannot verify subscriptions to @track_news. Please ask the bot owner to check the channel settings.",
  ]);
}

async function testDispatcherRunsUpdatesInOrderAndContainsFailures(): Promise<void> {
  const events: string[] = [];
  const router: UpdateRouter = {
    async route(update) {
      events.push(`start:${update.updateId}`);
      await delay(update.updateId === 1 ? 20 : 1);
      events.push(`end:${update.updateId}`);
      if (update.updateId === 2) {
        throw new Error("handler exploded");
      }
    },
  };
  const dispatcher = buildUpdateDispatcher({
    router,
    deduplicator: new UpdateDeduplicator(),
    logger: silentLogger,
    concurrency: 1,
  });

  await Promise.all([
    dispatcher.submit(textUpdate(1, "first")),
    dispatcher.submit(textUpdate(2, "second")),
    dispatcher.submit(textUpdate(3, "third")),
  ]);

  assert.deepEqual(events, ["start:1", "end:1", "start:2", "end:2", "start:3", "end:3"]);
}

async function run(): Promise<void> {
  const tempDir = await mkdtemp(path.join(os.tmpdir(), "command-router-test-"));
  try {
    await testCommandsAndDuplicates(tempDir);
    await testCheckWithRequiredChannel(tempDir);
    await testDispatcherRunsUpdatesInOrderAndContainsFailures();
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
  process.stdout.write("Command router integration tests passed.\n");
}

void run();
