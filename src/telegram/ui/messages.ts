import type { UrlRejectionReason } from "../../tracks/url-validator";

export function welcomeMessage(params: {
  allowedDomains: readonly string[];
  searchEnabled: boolean;
  requiredChannel?: string;
}): string {
  const lines = [
    "Hi! Send me a link to a track and I will reply with the MP3.",
    "",
    `Supported sources: ${params.allowedDomains.join(", ")}`,
  ];
  if (params.searchEnabled) {
    lines.push("You can also send a track or artist name and I will search for it.");
  }
  if (params.requiredChannel) {
    lines.push("", `To receive files, subscribe to ${params.requiredChannel}.`);
  }
  lines.push(
    "",
    "Examples:",
    "• https://soundcloud.com/artist/track",
    "• /check: check your subscription",
  );
  return lines.join("\n");
}

export function unknownCommandMessage(): string {
  return "Unknown command. Send /help to see what I can do.";
}

export function unsupportedInputMessage(): string {
  return "Please send a track link as a text message.";
}

export function linkRequiredMessage(allowedDomains: readonly string[]): string {
  return `Please send a link to a track from ${allowedDomains.join(", ")}.`;
}

export function rejectedUrlMessage(
  reason: UrlRejectionReason,
  allowedDomains: readonly string[],
): string {
  if (reason === "domain") {
    return `This source is not supported. I only download from: ${allowedDomains.join(", ")}.`;
  }
  if (reason === "protocol") {
    return "Only http and https links are supported.";
  }
  return "That link does not look valid. Please check it and try again.";
}

export function cooldownMessage(retryAfterSeconds: number): string {
  return `Too many requests. Please try again in ${retryAfterSeconds} s.`;
}

export function subscribeFirstMessage(channel: string): string {
  return `Please subscribe to ${channel} first, then repeat your request.`;
}

export function subscriptionStatusMessage(channel: string, subscribed: boolean): string {
  return `Subscription to ${channel}: ${subscribed ? "✅ yes" : "❌ no"}`;
}

export function noSubscriptionRequiredMessage(): string {
  return "No subscription is required to use this bot.";
}

export function channelMisconfiguredMessage(channel: string): string {
  return `I cannot verify subscriptions to ${channel}. Please ask the bot owner to check the channel settings.`;
}

export function downloadingMessage(label: string): string {
  return `🔎 Downloading: “${label}”…`;
}

export function downloadTimeoutMessage(): string {
  return "⏳ The download took too long. Please try again later.";
}

export function downloadFailedMessage(): string {
  return "Could not download this track. Check the link or try another one.";
}

export function fileTooLargeMessage(maxFileMb: number): string {
  return `The file is too large to send (>${Math.floor(maxFileMb)} MB).`;
}

export function sendFailedMessage(): string {
  return "The track was downloaded but I could not send it. Please try again later.";
}

export function genericErrorMessage(): string {
  return "Something went wrong 😕 Please try again a bit later.";
}

export function audioCaption(sourceLabel: string, botUsername?: string): string {
  const lines = [`Downloaded from: ${sourceLabel}`];
  if (botUsername) {
    lines.push(`via @${botUsername}`);
  }
  return lines.join("\n");
}
