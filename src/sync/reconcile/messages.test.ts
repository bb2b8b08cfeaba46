import assert from "node:assert/strict";
import test from "node:test";
import {
  extractMessageText,
  messageDirection,
  normalizeTimestamp,
  reconcileMessages,
  responseTimerMinutes,
} from "./messages";
import { openDatabase } from "@/sync/store/db";
import { getChat, insertChat } from "@/sync/store/chats";
import { countMessages, listMessages } from "@/sync/store/messages";
import { FakeRemote, seedShop } from "@/sync/testing/fakes";

const noon = () => new Date("2024-05-01T12:00:00Z");

function setup() {
  const db = openDatabase(":memory:");
  const shop = seedShop(db, { userId: "1000" });
  const chat = getChat(db, insertChat(db, shop.id, "c1", { clientName: "Ivan" }));
  if (!chat) throw new Error("chat not stored");
  return { db, shop, chat, remote: new FakeRemote() };
}

test("extractMessageText reads every known message shape", () => {
  assert.equal(extractMessageText({ text: "plain" }), "plain");
  assert.equal(extractMessageText({ content: { text: "nested" } }), "nested");
  assert.equal(extractMessageText({ content: "flat content" }), "flat content");
  assert.equal(extractMessageText({ message: { content: "inner" } }), "inner");
  assert.equal(extractMessageText({ content: { text: "" } }), "");
});

test("messageDirection compares the author with the shop user", () => {
  assert.equal(messageDirection({ direction: "OUT" }, "1000"), "outgoing");
  assert.equal(messageDirection({ direction: "in" }, "1000"), "incoming");
  assert.equal(messageDirection({ author_id: 1000 }, "1000"), "outgoing");
  assert.equal(messageDirection({ author: { id: "2000" } }, "1000"), "incoming");
  assert.equal(messageDirection({}, "1000"), "incoming");
});

test("normalizeTimestamp reads Unix seconds and zone-less ISO strings as UTC", () => {
  assert.equal(normalizeTimestamp(1714564800, noon), "2024-05-01T12:00:00.000Z");
  assert.equal(normalizeTimestamp("1714564800", noon), "2024-05-01T12:00:00.000Z");
  assert.equal(normalizeTimestamp("2024-05-01T10:00:00", noon), "2024-05-01T10:00:00.000Z");
  assert.equal(normalizeTimestamp("2024-05-01T10:00:00+03:00", noon), "2024-05-01T07:00:00.000Z");
  assert.equal(normalizeTimestamp("yesterday", noon), "2024-05-01T12:00:00.000Z");
  assert.equal(normalizeTimestamp(undefined, noon), "2024-05-01T12:00:00.000Z");
});

test("responseTimerMinutes counts only unanswered incoming messages", () => {
  const now = noon();
  assert.equal(responseTimerMinutes([{ type: "incoming", timestamp: "2024-05-01T11:30:00.000Z" }], now), 30);
  assert.equal(
    responseTimerMinutes(
      [
        { type: "incoming", timestamp: "2024-05-01T11:30:00.000Z" },
        { type: "outgoing", timestamp: "2024-05-01T11:45:00.000Z" },
      ],
      now,
    ),
    0,
  );
  assert.equal(responseTimerMinutes([], now), 0);
});

test("reconcileMessages appends new messages once and sets the response timer", async () => {
  const { db, shop, chat, remote } = setup();
  remote.messages.set("c1", [
    { id: "m1", text: "Is it available?", author_id: 2000, created: 1714563000 },
    { id: "m2", content: { text: "Yes" }, author_id: 1000, created: 1714563600 },
    { id: "m3", content: { text: "" } },
    { id: "m4", text: "Can you deliver?", direction: "in", created: 1714564200 },
  ]);

  assert.equal(await reconcileMessages(db, chat, shop, remote, { now: noon }), 3);
  assert.equal(await reconcileMessages(db, chat, shop, remote, { now: noon }), 0);

  const stored = listMessages(db, chat.id);
  assert.deepEqual(
    stored.map((m) => [m.remoteMessageId, m.type, m.senderName, m.timestamp]),
    [
      ["m1", "incoming", "Ivan", "2024-05-01T11:30:00.000Z"],
      ["m2", "outgoing", "Shop", "2024-05-01T11:40:00.000Z"],
      ["m4", "incoming", "Ivan", "2024-05-01T11:50:00.000Z"],
    ],
  );
  assert.equal(getChat(db, chat.id)?.responseTimer, 10);
});

test("messages without a remote id are matched on text, direction and time", async () => {
  const { db, shop, chat, remote } = setup();
  const message = { text: "hello", created: 1714563000 };
  remote.messages.set("c1", [message, { ...message }]);

  assert.equal(await reconcileMessages(db, chat, shop, remote, { now: noon }), 1);
  assert.equal(await reconcileMessages(db, chat, shop, remote, { now: noon }), 0);
  assert.equal(countMessages(db, chat.id), 1);
});

test("reconcileMessages lets remote errors through", async () => {
  const { db, shop, chat, remote } = setup();
  remote.messagesError = new Error("timeout");

  await assert.rejects(reconcileMessages(db, chat, shop, remote), /timeout/);
  assert.equal(countMessages(db, chat.id), 0);
});
