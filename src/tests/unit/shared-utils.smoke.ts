import assert from "node:assert/strict";
import { UserCooldown } from "../../shared/utils/cooldown";
import { UpdateDeduplicator } from "../../shared/utils/telegram-idempotency";

function testCooldown(): void {
  let now = 1_000;
  const cooldown = new UserCooldown(20_000, () => now);

  assert.deepEqual(cooldown.checkAndConsume(7), { allowed: true, retryAfterSeconds: 0 });
  now = 6_000;
  assert.deepEqual(cooldown.checkAndConsume(7), { allowed: false, retryAfterSeconds: 15 });
  assert.deepEqual(cooldown.checkAndConsume(8), { allowed: true, retryAfterSeconds: 0 });
  now = 21_000;
  assert.deepEqual(cooldown.checkAndConsume(7), { allowed: true, retryAfterSeconds: 0 });
  now = 21_500;
  assert.deepEqual(cooldown.checkAndConsume(7), { allowed: false, retryAfterSeconds: 20 });
  now = 40_999;
  assert.deepEqual(cooldown.checkAndConsume(7), { allowed: false, retryAfterSeconds: 1 });
}

function testDisabledCooldown(): void {
  const cooldown = new UserCooldown(0);
  assert.equal(cooldown.checkAndConsume(7).allowed, true);
  assert.equal(cooldown.checkAndConsume(7).allowed, true);
}

function testUpdateDeduplicator(): void {
  const deduplicator = new UpdateDeduplicator(2);
  assert.equal(deduplicator.shouldProcess(1), true);
  assert.equal(deduplicator.shouldProcess(1), false);
  assert.equal(deduplicator.shouldProcess(2), true);
  assert.equal(deduplicator.shouldProcess(3), true);
  assert.equal(deduplicator.size, 2);
  assert.equal(deduplicator.shouldProcess(2), false);
  assert.equal(deduplicator.shouldProcess(1), true);
}

function run(): void {
  testCooldown();
  testDisabledCooldown();
  testUpdateDeduplicator();
  process.stdout.write("Shared utils smoke checks passed.\n");
}

run();
