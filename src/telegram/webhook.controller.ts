import { Router } from "express";
import type { Request, Response } from "express";
import type { Logger } from "../config/logger";
import type { UpdateDispatcher } from "../router/dispatch/update.dispatcher";
import type { TelegramUpdate } from "../shared/types/telegram.types";

interface WebhookControllerDeps {
  dispatcher: UpdateDispatcher;
  logger: Logger;
  secretToken?: string;
}

function isSecretTokenValid(request: Request, expectedSecretToken?: string): boolean {
  if (!expectedSecretToken) {
    return true;
  }

  const header = request.header("x-telegram-bot-api-secret-token");
  return header === expectedSecretToken;
}

function isTelegramUpdate(body: unknown): body is TelegramUpdate {
  return (
    typeof body === "object" &&
    body !== null &&
    "update_id" in body &&
    typeof body.update_id === "number"
  );
}

export function buildWebhookController(deps: WebhookControllerDeps): Router {
  const router = Router();

  router.post("/", (request: Request, response: Response) => {
    if (!isSecretTokenValid(request, deps.secretToken)) {
      response.status(401).json({ ok: false, error: "Invalid Telegram secret token" });
      return;
    }

    const body: unknown = request.body;
    if (!isTelegramUpdate(body)) {
      response.status(400).json({ ok: false, error: "Invalid body" });
      return;
    }

    // Downloads outlive Telegram's webhook timeout, so acknowledge first.
    response.status(200).json({ ok: true });
    deps.logger.debug("webhook.update_received", { updateId: body.update_id });
    void deps.dispatcher.submit(body);
  });

  return router;
}
