import { expect } from 'chai';
import {
  CHAT_ID,
  FakeChatApi,
  FakeClock,
  FakeRealtimeChannel,
  ME,
  OTHER_CHAT_ID,
  PEER,
  RecordingNotifier,
  T0,
  serverMessage,
  sleep,
  tokenSequence
} from '../helpers/fakes';
import { StaticCurrentUserProvider } from '../../src/auth/current-user';
import { ChatSummaryTracker } from '../../src/handlers/chat-summary';
import { ReconciliationEngine, ReconcilerOptions } from '../../src/handlers/reconciler';
import { MessageStatus } from '../../src/types/message';
import { SendResult, SessionChange } from '../../src/types/reconcile';

interface SetupOptions {
  connected?: boolean;
  failConnect?: boolean;
  userId?: number | null;
  options?: Partial<ReconcilerOptions>;
}

function setup(opts: SetupOptions = {}) {
  const channel = new FakeRealtimeChannel(opts.connected ?? true);
  channel.failConnect = opts.failConnect ?? false;
  const api = new FakeChatApi();
  const users = new StaticCurrentUserProvider(opts.userId === undefined ? ME : opts.userId);
  const notifier = new RecordingNotifier();
  const summaries = new ChatSummaryTracker();
  const clock = new FakeClock();
  const engine = new ReconciliationEngine({
    channel,
    api,
    users,
    notifier,
    summaries,
    now: clock.now,
    newCorrelationToken: tokenSequence(),
    options: {
      realtimeSendTimeoutMs: 30,
      markReadTimeoutMs: 30,
      failedEvictionMs: 40,
      heuristicMatchWindowMs: 10_000,
      initialPageSize: 3,
      pageSize: 2,
      ...opts.options
    }
  });
  const changes: SessionChange[] = [];
  engine.onChange((change) => changes.push(change));
  return { channel, api, users, notifier, summaries, clock, engine, changes };
}

function accepted(result: SendResult) {
  if (!result.ok) throw new Error(`send refused: ${result.error.message}`);
  return result;
}

// Four messages; the initial page (3) holds ids 2..4.
function seedHistory(api: FakeChatApi): void {
  api.seed(CHAT_ID, [
    serverMessage({ serverId: 1, sentAt: T0 - 4_000, content: 'one' }),
    serverMessage({ serverId: 2, sentAt: T0 - 3_000, content: 'two', senderId: ME }),
    serverMessage({ serverId: 3, sentAt: T0 - 2_000, content: 'three' }),
    serverMessage({ serverId: 4, sentAt: T0 - 1_000, content: 'four' })
  ]);
}

describe('Reconciliation engine', () => {
  let current: ReturnType<typeof setup> | null = null;
  const start = (opts?: SetupOptions) => {
    current = setup(opts);
    return current;
  };

  afterEach(async () => {
    if (current) {
      current.engine.close();
      await current.engine.idle();
      current = null;
    }
  });

  describe('sending', () => {
    it('should confirm a real-time send through correlation and status events', async () => {
      const { engine, channel } = start();
      await engine.openChat(CHAT_ID);

      const { message, delivery } = accepted(engine.sendMessage('hi'));
      expect(message.status).to.equal(MessageStatus.Sending);
      expect(engine.snapshot().messages.map((m) => m.status)).to.deep.equal([MessageStatus.Sending]);

      await delivery;
      expect(engine.snapshot().messages[0].status).to.equal(MessageStatus.Sent);

      channel.events.emitCorrelationConfirmed('ct-1', 500, CHAT_ID);
      channel.events.emitMessageReceived(
        serverMessage({ serverId: 500, senderId: ME, content: 'hi', correlationToken: 'ct-1', sentAt: T0 + 10 })
      );
      channel.events.emitStatusUpdated(CHAT_ID, 500, MessageStatus.Delivered);
      channel.events.emitStatusUpdated(CHAT_ID, 500, MessageStatus.Read);

      const messages = engine.snapshot().messages;
      expect(messages).to.have.length(1);
      expect(messages[0]).to.include({
        correlationToken: 'ct-1',
        serverId: 500,
        status: MessageStatus.Read,
        isRead: true,
        readAt: T0,
        isOwnMessage: true
      });
    });

    it('should fall back to the API and ignore the later echo', async () => {
      const { engine, channel, api } = start({ connected: false, failConnect: true });
      await engine.openChat(CHAT_ID);
      expect(engine.snapshot().isConnected).to.equal(false);

      await accepted(engine.sendMessage('hi')).delivery;
      expect(api.sends).to.deep.equal([{ chatId: CHAT_ID, content: 'hi', correlationToken: 'ct-1' }]);

      channel.events.emitMessageReceived(serverMessage({ serverId: 1000, senderId: ME, content: 'hi' }));

      const messages = engine.snapshot().messages;
      expect(messages).to.have.length(1);
      expect(messages[0]).to.include({ serverId: 1000, correlationToken: 'ct-1', status: MessageStatus.Sent });
    });

    it('should mark a message Failed when both paths fail and evict it later', async () => {
      const { engine, api, notifier, changes } = start({ connected: false, failConnect: true });
      api.sendBehavior = 'throw';
      await engine.openChat(CHAT_ID);

      const outcome = await accepted(engine.sendMessage('hi')).delivery;
      expect(outcome.ok).to.equal(false);
      expect(engine.snapshot().messages[0].status).to.equal(MessageStatus.Failed);
      expect(notifier.texts()).to.include('Failed to send message');

      await sleep(80);
      expect(engine.snapshot().messages).to.have.length(0);
      expect(changes).to.deep.include({ type: 'removed', correlationToken: 'ct-1' });
    });

    it('should pair a tokenless echo that beats the confirmation', async () => {
      const { engine, channel, api } = start();
      channel.sendBehavior = 'hang';
      api.nextServerId = 700;
      await engine.openChat(CHAT_ID);

      const { delivery } = accepted(engine.sendMessage('hi'));
      channel.events.emitMessageReceived(serverMessage({ serverId: 700, senderId: ME, content: 'hi', sentAt: T0 + 100 }));

      const afterEcho = engine.snapshot().messages;
      expect(afterEcho).to.have.length(1);
      expect(afterEcho[0]).to.include({ serverId: 700, correlationToken: 'ct-1', status: MessageStatus.Sent });

      await delivery;
      const final = engine.snapshot().messages;
      expect(final).to.have.length(1);
      expect(final[0]).to.include({ serverId: 700, status: MessageStatus.Sent, sentAt: T0 + 100 });
    });

    it('should ignore a failure that arrives after the server confirmed the message', async () => {
      const { engine, channel } = start();
      await engine.openChat(CHAT_ID);
      await accepted(engine.sendMessage('hi')).delivery;
      channel.events.emitCorrelationConfirmed('ct-1', 500, CHAT_ID);

      await engine.apply({ type: 'DispatchFailed', correlationToken: 'ct-1' });
      expect(engine.snapshot().messages[0].status).to.equal(MessageStatus.Sent);
    });

    it('should resend a failed message as a new logical message', async () => {
      const { engine, api } = start({ connected: false, failConnect: true });
      api.sendBehavior = 'throw';
      await engine.openChat(CHAT_ID);
      await accepted(engine.sendMessage('hi')).delivery;

      api.sendBehavior = 'confirm';
      const retry = accepted(engine.retryFailed('ct-1'));
      expect(retry.message.correlationToken).to.equal('ct-2');
      expect(engine.snapshot().messages.map((m) => m.correlationToken)).to.deep.equal(['ct-2']);

      await retry.delivery;
      expect(engine.snapshot().messages[0]).to.include({ serverId: 1000, status: MessageStatus.Sent });

      await sleep(60);
      expect(engine.snapshot().messages).to.have.length(1);
    });

    it('should keep a failed message when the retry is refused for lack of a user', async () => {
      const { engine, api, users, notifier } = start({ connected: false, failConnect: true });
      api.sendBehavior = 'throw';
      await engine.openChat(CHAT_ID);
      await accepted(engine.sendMessage('hi')).delivery;

      users.set(null);
      await engine.markVisibleAsRead([]);
      const retry = engine.retryFailed('ct-1');
      expect(!retry.ok && retry.error.code).to.equal('auth_unavailable');
      expect(notifier.texts()).to.include('You are not signed in');
      expect(engine.snapshot().messages.map((m) => [m.correlationToken, m.status])).to.deep.equal([
        ['ct-1', MessageStatus.Failed]
      ]);
      expect(api.sends).to.have.length(1);
    });

    it('should refuse to retry a message that has not failed', async () => {
      const { engine } = start();
      await engine.openChat(CHAT_ID);
      accepted(engine.sendMessage('hi'));
      const retry = engine.retryFailed('ct-1');
      expect(retry.ok).to.equal(false);
    });

    it('should refuse sends without an open chat', () => {
      const { engine } = start();
      const closed = engine.sendMessage('hi');
      expect(!closed.ok && closed.error.code).to.equal('no_session');
    });

    it('should refuse a blank message', async () => {
      const { engine, channel } = start();
      await engine.openChat(CHAT_ID);
      const blank = engine.sendMessage('   ');
      expect(!blank.ok && blank.error.code).to.equal('invalid_input');
      expect(engine.snapshot().messages).to.have.length(0);
      expect(channel.sent).to.have.length(0);
    });

    it('should accept a submit through the event interface', async () => {
      const { engine } = start();
      await engine.openChat(CHAT_ID);
      await engine.apply({ type: 'UserSubmit', content: '  spaced  ' });
      await engine.idle();
      expect(engine.snapshot().messages.map((m) => m.content)).to.deep.equal(['spaced']);
    });
  });

  describe('identity', () => {
    it('should stay read-only until a user is known', async () => {
      const { engine, users, notifier, channel } = start({ userId: null });
      const opened = await engine.openChat(CHAT_ID);
      expect(opened.ok).to.equal(true);
      expect(notifier.texts()).to.include('Not signed in: chat is read-only');

      const refused = engine.sendMessage('hi');
      expect(!refused.ok && refused.error.code).to.equal('auth_unavailable');
      expect(engine.snapshot().messages).to.have.length(0);
      expect(channel.sent).to.have.length(0);

      users.set(ME);
      await engine.markAllAsRead();
      expect(engine.snapshot().currentUserId).to.equal(ME);
      expect(engine.sendMessage('hi').ok).to.equal(true);
    });
  });

  describe('opening chats', () => {
    it('should reject a malformed chat id without touching the session', async () => {
      const { engine, api, notifier, channel } = start();
      await engine.openChat(CHAT_ID);

      const result = await engine.openChat('not-a-chat');
      expect(result.ok).to.equal(false);
      expect(!result.ok && result.error.code).to.equal('invalid_chat_id');
      expect(notifier.texts()).to.include('Invalid chat reference');
      expect(engine.snapshot().chatId).to.equal(CHAT_ID);
      expect(api.getCalls).to.have.length(1);
      expect(channel.events.size).to.equal(1);
    });

    it('should create no session for a malformed id on a fresh engine', async () => {
      const { engine, api, channel } = start();
      await engine.openChat('12345');
      expect(engine.snapshot().chatId).to.equal(null);
      expect(api.getCalls).to.have.length(0);
      expect(channel.events.size).to.equal(0);
    });

    it('should load the first page and mark unread incoming messages read', async () => {
      const { engine, api, channel } = start();
      seedHistory(api);

      const result = await engine.openChat(CHAT_ID.toUpperCase());
      expect(result).to.deep.equal({ ok: true, chatId: CHAT_ID, loaded: 3 });
      expect(api.getCalls).to.deep.equal([{ chatId: CHAT_ID, offset: 0, limit: 3 }]);

      await engine.idle();
      expect(channel.reads).to.deep.equal([
        { chatId: CHAT_ID, serverId: 3 },
        { chatId: CHAT_ID, serverId: 4 }
      ]);
      const state = engine.snapshot();
      expect(state.messages.map((m) => m.serverId)).to.deep.equal([2, 3, 4]);
      expect(state.messages.map((m) => m.status)).to.deep.equal([
        MessageStatus.Sent,
        MessageStatus.Read,
        MessageStatus.Read
      ]);
      expect(state.canLoadMore).to.equal(true);
    });

    it('should connect the real-time channel when it is down', async () => {
      const { engine, channel, changes } = start({ connected: false });
      await engine.openChat(CHAT_ID);
      expect(channel.connectCalls).to.equal(1);
      expect(engine.snapshot().isConnected).to.equal(true);
      expect(changes).to.deep.include({ type: 'connection', isConnected: true });
    });

    it('should share one load between concurrent opens of the same chat', async () => {
      const { engine, api, channel } = start();
      const [a, b] = await Promise.all([engine.openChat(CHAT_ID), engine.openChat(CHAT_ID.toUpperCase())]);
      expect(a.ok && b.ok).to.equal(true);
      expect(api.getCalls).to.have.length(1);
      expect(channel.events.size).to.equal(1);
    });

    it('should serialize opens of different chats and keep one subscription', async () => {
      const { engine, api, channel } = start();
      api.seed(OTHER_CHAT_ID, [serverMessage({ chatId: OTHER_CHAT_ID, serverId: 90 })]);
      seedHistory(api);

      const [first, second] = await Promise.all([engine.openChat(CHAT_ID), engine.openChat(OTHER_CHAT_ID)]);
      expect(first.ok).to.equal(true);
      expect(second.ok).to.equal(true);
      expect(api.getCalls.map((c) => c.chatId)).to.deep.equal([CHAT_ID, OTHER_CHAT_ID]);
      expect(engine.snapshot().chatId).to.equal(OTHER_CHAT_ID);
      expect(engine.snapshot().messages.map((m) => m.serverId)).to.deep.equal([90]);
      expect(channel.events.size).to.equal(1);
    });

    it('should open again after a close that interrupted the first load', async () => {
      const { engine, api } = start();
      seedHistory(api);
      const gate = api.holdNextGet();
      const first = engine.openChat(CHAT_ID);
      await sleep(5);
      expect(api.getCalls).to.have.length(1);

      engine.close();
      const second = engine.openChat(CHAT_ID);
      gate.resolve();

      const [r1, r2] = await Promise.all([first, second]);
      expect(!r1.ok && r1.error.code).to.equal('cancelled');
      expect(r2).to.deep.equal({ ok: true, chatId: CHAT_ID, loaded: 3 });
      expect(engine.chatId).to.equal(CHAT_ID);
    });

    it('should not start an open that was closed before it ran', async () => {
      const { engine, api } = start();
      seedHistory(api);
      const pending = engine.openChat(CHAT_ID);
      engine.close();

      const result = await pending;
      expect(!result.ok && result.error.code).to.equal('cancelled');
      expect(api.getCalls).to.have.length(0);
      expect(engine.chatId).to.equal(null);
    });

    it('should report a failed first page', async () => {
      const { engine, api, notifier } = start();
      api.failGets = true;
      const result = await engine.openChat(CHAT_ID);
      expect(!result.ok && result.error.code).to.equal('transport');
      expect(notifier.texts()).to.include('Failed to load messages');
    });
  });

  describe('older pages', () => {
    it('should prepend the page before the confirmed messages', async () => {
      const { engine, api } = start();
      seedHistory(api);
      await engine.openChat(CHAT_ID);

      const result = await engine.loadOlderMessages();
      expect(result).to.deep.equal({ ok: true, added: 1, canLoadMore: false });
      expect(api.getCalls[1]).to.deep.equal({ chatId: CHAT_ID, offset: 3, limit: 2 });
      expect(engine.snapshot().messages.map((m) => m.serverId)).to.deep.equal([1, 2, 3, 4]);

      const again = await engine.loadOlderMessages();
      expect(again).to.deep.equal({ ok: true, added: 0, canLoadMore: false });
      expect(api.getCalls).to.have.length(2);
    });

    it('should share one fetch between concurrent calls', async () => {
      const { engine, api } = start();
      seedHistory(api);
      await engine.openChat(CHAT_ID);

      const gate = api.holdNextGet();
      const first = engine.loadOlderMessages();
      const second = engine.loadOlderMessages();
      expect(second).to.equal(first);
      expect(engine.snapshot().isLoadingOlder).to.equal(true);

      gate.resolve();
      await first;
      expect(api.getCalls).to.have.length(2);
      expect(engine.snapshot().isLoadingOlder).to.equal(false);
    });

    it('should discard an older page when the chat changes', async () => {
      const { engine, api } = start();
      seedHistory(api);
      api.seed(OTHER_CHAT_ID, [serverMessage({ chatId: OTHER_CHAT_ID, serverId: 90 })]);
      await engine.openChat(CHAT_ID);

      const gate = api.holdNextGet();
      const pending = engine.loadOlderMessages();
      await engine.openChat(OTHER_CHAT_ID);
      gate.resolve();

      const result = await pending;
      expect(!result.ok && result.error.code).to.equal('cancelled');
      expect(engine.snapshot().messages.map((m) => m.serverId)).to.deep.equal([90]);
    });
  });

  describe('read receipts', () => {
    it('should mark an incoming real-time message read and clear the unread count', async () => {
      const { engine, channel, summaries } = start();
      await engine.openChat(CHAT_ID);

      channel.events.emitMessageReceived(serverMessage({ serverId: 300 }));
      await engine.idle();

      expect(channel.reads).to.deep.equal([{ chatId: CHAT_ID, serverId: 300 }]);
      expect(engine.snapshot().messages[0]).to.include({ status: MessageStatus.Read, isRead: true });
      expect(summaries.get(CHAT_ID)).to.deep.equal({
        chatId: CHAT_ID,
        lastMessage: 'hello',
        lastMessageTime: T0,
        unreadCount: 0
      });
    });

    it('should fall back to the API when the real-time receipt times out', async () => {
      const { engine, channel, api } = start();
      channel.readBehavior = 'hang';
      await engine.openChat(CHAT_ID);

      channel.events.emitMessageReceived(serverMessage({ serverId: 300 }));
      await engine.idle();
      expect(api.marks).to.deep.equal([{ chatId: CHAT_ID, serverIds: [300] }]);
    });

    it('should keep the local Read state when the server cannot be told', async () => {
      const { engine, channel, api, notifier } = start();
      channel.readBehavior = 'throw';
      api.failMarks = true;
      await engine.openChat(CHAT_ID);

      channel.events.emitMessageReceived(serverMessage({ serverId: 300 }));
      await engine.idle();
      expect(engine.snapshot().messages[0].status).to.equal(MessageStatus.Read);
      expect(notifier.texts()).to.include('Some read receipts could not be delivered');
    });

    it('should never send receipts for own messages', async () => {
      const { engine, channel } = start();
      await engine.openChat(CHAT_ID);
      channel.events.emitMessageReceived(serverMessage({ serverId: 301, senderId: ME }));

      const result = await engine.markVisibleAsRead([301]);
      expect(result).to.deep.equal({ ok: true, outcomes: [] });
      expect(channel.reads).to.have.length(0);
    });
  });

  describe('real-time events', () => {
    it('should keep status monotonic against late events', async () => {
      const { engine, channel } = start();
      await engine.openChat(CHAT_ID);
      channel.events.emitMessageReceived(serverMessage({ serverId: 302, senderId: ME }));
      channel.events.emitStatusUpdated(CHAT_ID, 302, MessageStatus.Read);
      channel.events.emitStatusUpdated(CHAT_ID, 302, MessageStatus.Delivered);
      expect(engine.snapshot().messages[0].status).to.equal(MessageStatus.Read);
    });

    it('should ignore events for other chats', async () => {
      const { engine } = start();
      await engine.openChat(CHAT_ID);
      await engine.apply({ type: 'RealtimeMessageReceived', message: serverMessage({ chatId: OTHER_CHAT_ID }) });
      expect(engine.snapshot().messages).to.have.length(0);
    });

    it('should track typing peers and forward local typing once', async () => {
      const { engine, channel } = start();
      await engine.openChat(CHAT_ID);

      channel.events.emitUserTyping(CHAT_ID, PEER, true);
      channel.events.emitUserTyping(CHAT_ID, ME, true);
      expect(engine.snapshot().typingUserIds).to.deep.equal([PEER]);
      channel.events.emitUserTyping(CHAT_ID, PEER, false);
      expect(engine.snapshot().typingUserIds).to.deep.equal([]);

      await engine.setTyping(true);
      await engine.setTyping(true);
      expect(channel.typing).to.deep.equal([{ chatId: CHAT_ID, isTyping: true }]);
    });

    it('should follow connection changes', async () => {
      const { engine, channel, changes } = start();
      await engine.openChat(CHAT_ID);
      channel.setConnected(false);
      expect(engine.snapshot().isConnected).to.equal(false);
      expect(changes).to.deep.include({ type: 'connection', isConnected: false });
    });
  });

  describe('teardown', () => {
    it('should unsubscribe once and stop reacting to events', async () => {
      const { engine, channel } = start();
      await engine.openChat(CHAT_ID);
      expect(channel.events.size).to.equal(1);

      engine.close();
      engine.close();
      expect(channel.events.size).to.equal(0);
      channel.events.emitMessageReceived(serverMessage({ serverId: 303 }));
      expect(engine.snapshot()).to.include({ chatId: null });
      expect(engine.snapshot().messages).to.have.length(0);
    });

    it('should cancel pending evictions on close', async () => {
      const { engine, api, changes } = start({ connected: false, failConnect: true });
      api.sendBehavior = 'throw';
      await engine.openChat(CHAT_ID);
      await accepted(engine.sendMessage('hi')).delivery;

      engine.close();
      await sleep(60);
      expect(changes.filter((c) => c.type === 'removed')).to.have.length(0);
    });
  });
});
