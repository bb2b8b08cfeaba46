import assert from "node:assert/strict";
import test from "node:test";
import { deriveCustomer, deriveLastMessage, deriveUnreadCount, reconcileChat } from "./chat";
import { findChat, listChatsForShop, setChatStatus } from "@/sync/store/chats";
import { countMessages } from "@/sync/store/messages";
import { FakeRemote, seedShop, testContext } from "@/sync/testing/fakes";
import type { Chat } from "@/sync/types";

const payload = {
  id: "501",
  users: [
    { id: 1000, name: "Acme" },
    { id: 2000, name: "Ivan" },
  ],
  last_message: { content: { text: "Is it available?" } },
  unread_count: 2,
  context: { type: "item", value: { id: 42, title: "Oak chair" } },
};

function setup() {
  const ctx = testContext();
  const shop = seedShop(ctx.db, { shopUrl: "https://www.avito.ru/brands/acme", userId: "1000" });
  return { ctx, shop };
}

function withoutTimestamps(chat: Chat | undefined) {
  assert.ok(chat);
  const { updatedAt: _updatedAt, ...rest } = chat;
  return rest;
}

test("deriveLastMessage handles nested, scalar, null and absent previews", () => {
  assert.equal(deriveLastMessage({ last_message: { content: { text: "hi" } } }), "hi");
  assert.equal(deriveLastMessage({ last_message: { text: "top" } }), "top");
  assert.equal(deriveLastMessage({ last_message: "plain" }), "plain");
  assert.equal(deriveLastMessage({ last_message: null }), "");
  assert.equal(deriveLastMessage({}), undefined);
});

test("deriveCustomer skips the shop's own user", () => {
  assert.deepEqual(deriveCustomer(payload, "1000"), { clientName: "Ivan", customerId: "2000" });
  assert.deepEqual(deriveCustomer({ users: [{ id: 3000, username: "buyer3000" }] }, "1000"), {
    clientName: "buyer3000",
    customerId: "3000",
  });
  assert.deepEqual(deriveCustomer({ users: [{ id: 1000 }] }, "1000"), { clientName: "Client", customerId: null });
  assert.equal(deriveCustomer({}, "1000"), undefined);
});

test("deriveUnreadCount keeps integers and zeroes anything else", () => {
  assert.equal(deriveUnreadCount({ unread_count: 3 }), 3);
  assert.equal(deriveUnreadCount({ unread_count: "3" }), 0);
  assert.equal(deriveUnreadCount({}), undefined);
});

test("reconcileChat creates a chat with its listing context", async () => {
  const { ctx, shop } = setup();
  const outcome = await reconcileChat(ctx, shop, payload);

  assert.deepEqual(outcome, { ok: true, value: { created: 1, updated: 0, messages: 0 } });
  const chat = findChat(ctx.db, shop.id, "501");
  assert.equal(chat?.productUrl, "https://www.avito.ru/acme/items/42");
  assert.equal(chat?.listingData, '{"id":42,"title":"Oak chair"}');
  assert.equal(chat?.clientName, "Ivan");
  assert.equal(chat?.customerId, "2000");
  assert.equal(chat?.lastMessage, "Is it available?");
  assert.equal(chat?.unreadCount, 2);
  assert.equal(chat?.status, "active");
  assert.equal(chat?.priority, "new");
});

test("reconciling the same payload twice updates in place with identical content", async () => {
  const { ctx, shop } = setup();
  await reconcileChat(ctx, shop, payload);
  const before = findChat(ctx.db, shop.id, "501");

  const outcome = await reconcileChat(ctx, shop, payload);

  assert.deepEqual(outcome, { ok: true, value: { created: 0, updated: 1, messages: 0 } });
  assert.deepEqual(withoutTimestamps(findChat(ctx.db, shop.id, "501")), withoutTimestamps(before));
  assert.equal(listChatsForShop(ctx.db, shop.id).length, 1);
});

test("resync never touches an operator-set status", async () => {
  const { ctx, shop } = setup();
  await reconcileChat(ctx, shop, payload);
  const chat = findChat(ctx.db, shop.id, "501");
  assert.ok(chat);
  setChatStatus(ctx.db, chat.id, "completed");

  await reconcileChat(ctx, shop, { ...payload, unread_count: 5 });

  const after = findChat(ctx.db, shop.id, "501");
  assert.equal(after?.status, "completed");
  assert.equal(after?.unreadCount, 5);
});

test("absent keys keep stored values while present empty values overwrite", async () => {
  const { ctx, shop } = setup();
  await reconcileChat(ctx, shop, payload);

  await reconcileChat(ctx, shop, { id: "501" });
  let chat = findChat(ctx.db, shop.id, "501");
  assert.equal(chat?.lastMessage, "Is it available?");
  assert.equal(chat?.productUrl, "https://www.avito.ru/acme/items/42");
  assert.equal(chat?.clientName, "Ivan");

  await reconcileChat(ctx, shop, { id: "501", last_message: null, unread_count: null });
  chat = findChat(ctx.db, shop.id, "501");
  assert.equal(chat?.lastMessage, "");
  assert.equal(chat?.unreadCount, 0);
});

test("a payload without an id is skipped", async () => {
  const { ctx, shop } = setup();
  const outcome = await reconcileChat(ctx, shop, { id: "  ", last_message: "orphan" });

  assert.deepEqual(outcome, { ok: true, value: { created: 0, updated: 0, messages: 0 } });
  assert.equal(listChatsForShop(ctx.db, shop.id).length, 0);
});

test("numeric chat ids are stored as strings", async () => {
  const { ctx, shop } = setup();
  await reconcileChat(ctx, shop, { id: 777 });
  assert.equal(findChat(ctx.db, shop.id, "777")?.remoteChatId, "777");
});

test("with a remote, missing context is fetched and messages are appended", async () => {
  const { ctx, shop } = setup();
  const remote = new FakeRemote();
  remote.details.set("601", { context: { value: { id: 77 } } });
  remote.messages.set("601", [{ id: "m1", text: "hi", author_id: 2000, created: 1714563000 }]);

  const outcome = await reconcileChat(ctx, shop, { id: "601" }, remote);

  assert.deepEqual(outcome, { ok: true, value: { created: 1, updated: 0, messages: 1 } });
  const chat = findChat(ctx.db, shop.id, "601");
  assert.equal(chat?.productUrl, "https://www.avito.ru/acme/items/77");
  assert.equal(chat?.clientName, "Client");
  assert.equal(chat?.responseTimer, 30);
});

test("a message failure still keeps the chat", async () => {
  const { ctx, shop } = setup();
  const remote = new FakeRemote();
  remote.messagesError = new Error("503 Service Unavailable");

  const outcome = await reconcileChat(ctx, shop, payload, remote);

  assert.deepEqual(outcome, { ok: true, value: { created: 1, updated: 0, messages: 0 } });
  const chat = findChat(ctx.db, shop.id, "501");
  assert.ok(chat);
  assert.equal(countMessages(ctx.db, chat.id), 0);
});

test("a store failure is returned as a store error", async () => {
  const { ctx, shop } = setup();
  ctx.db.close();

  const outcome = await reconcileChat(ctx, shop, payload);

  assert.equal(outcome.ok, false);
  if (!outcome.ok) assert.equal(outcome.error.kind, "store");
});
