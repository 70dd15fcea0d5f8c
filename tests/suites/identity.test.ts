import { expect } from 'chai';
import { CHAT_ID, ME, OTHER_CHAT_ID, PEER, T0 } from '../helpers/fakes';
import { IdentityIndex, MessageIdentityResolver } from '../../src/handlers/identity';
import { ChatMessage, MessageStatus } from '../../src/types/message';

function entry(overrides: Partial<ChatMessage>): ChatMessage {
  return {
    correlationToken: '',
    serverId: 0,
    chatId: CHAT_ID,
    senderId: ME,
    senderName: '',
    content: 'hi',
    sentAt: T0,
    status: MessageStatus.Sending,
    isRead: false,
    readAt: null,
    isOwnMessage: true,
    ...overrides
  };
}

function indexOf(entries: ChatMessage[]): IdentityIndex {
  return {
    byCorrelation: (token) => entries.find((e) => e.correlationToken === token),
    byServerId: (serverId) => entries.find((e) => e.serverId === serverId),
    all: () => entries
  };
}

describe('Message identity resolver', () => {
  const resolver = new MessageIdentityResolver(10_000);

  it('should prefer the correlation token over the server id', () => {
    const optimistic = entry({ correlationToken: 'ct-1' });
    const confirmed = entry({ serverId: 5, content: 'other', status: MessageStatus.Sent });
    const match = resolver.resolve(indexOf([optimistic, confirmed]), {
      correlationToken: 'ct-1',
      serverId: 5,
      chatId: CHAT_ID,
      senderId: ME,
      content: 'hi',
      sentAt: T0
    });
    expect(match?.rule).to.equal('correlation');
    expect(match?.message).to.equal(optimistic);
  });

  it('should fall back to the server id when the token is unknown', () => {
    const confirmed = entry({ serverId: 5, status: MessageStatus.Sent });
    const match = resolver.resolve(indexOf([confirmed]), {
      correlationToken: 'ct-unknown',
      serverId: 5,
      chatId: CHAT_ID,
      senderId: ME,
      content: 'hi',
      sentAt: T0
    });
    expect(match?.rule).to.equal('serverId');
  });

  it('should not use the heuristic for a record that carries a token', () => {
    const optimistic = entry({ correlationToken: 'ct-1' });
    const match = resolver.resolve(indexOf([optimistic]), {
      correlationToken: 'ct-2',
      chatId: CHAT_ID,
      senderId: ME,
      content: 'hi',
      sentAt: T0
    });
    expect(match).to.equal(null);
  });

  it('should pair a tokenless echo with the closest optimistic entry inside the window', () => {
    const older = entry({ correlationToken: 'ct-1', sentAt: T0 - 8_000 });
    const closer = entry({ correlationToken: 'ct-2', sentAt: T0 - 1_000 });
    const match = resolver.resolve(indexOf([older, closer]), {
      serverId: 9,
      chatId: CHAT_ID,
      senderId: ME,
      content: 'hi',
      sentAt: T0
    });
    expect(match?.rule).to.equal('heuristic');
    expect(match?.message).to.equal(closer);
  });

  it('should reject heuristic candidates that differ or are out of the window', () => {
    const probe = { serverId: 9, chatId: CHAT_ID, senderId: ME, content: 'hi', sentAt: T0 };
    const candidates = [
      entry({ correlationToken: 'a', sentAt: T0 - 10_001 }),
      entry({ correlationToken: 'b', content: 'hi!' }),
      entry({ correlationToken: 'c', senderId: PEER }),
      entry({ correlationToken: 'd', chatId: OTHER_CHAT_ID }),
      entry({ correlationToken: 'e', status: MessageStatus.Failed }),
      entry({ correlationToken: 'f', serverId: 3, status: MessageStatus.Sent })
    ];
    expect(resolver.resolve(indexOf(candidates), probe)).to.equal(null);
  });

  it('should accept a delta exactly at the window edge', () => {
    const edge = entry({ correlationToken: 'ct-1', sentAt: T0 - 10_000 });
    const match = resolver.resolve(indexOf([edge]), { chatId: CHAT_ID, senderId: ME, content: 'hi', sentAt: T0 });
    expect(match?.message).to.equal(edge);
  });
});
