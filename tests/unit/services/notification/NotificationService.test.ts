import { MessageFormatter, NotificationService } from '../../../../src/services/notification';
import type { MessageSender, NotificationEvent } from '../../../../src/services/notification';
import { InMemoryStore } from '../../../fixtures/InMemoryStore';
import { buildTarget } from '../../../fixtures/targets';

describe('NotificationService', () => {
  let store: InMemoryStore;
  let sendMessage: jest.Mock;
  let sender: MessageSender;

  const target = buildTarget({ id: 5, name: 'Search' });
  const downEvent: NotificationEvent = {
    kind: 'down',
    target,
    incidentStart: new Date('2026-03-01T10:00:00Z'),
    failureCount: 3,
    error: 'Timeout: timeout of 10000ms exceeded',
  };

  async function subscribe(chatId: string, targetId: number | null, extra: { muted?: boolean; anomalyNotifications?: boolean } = {}) {
    await store.createSubscription({
      chatId,
      targetId,
      muted: extra.muted ?? false,
      anomalyNotifications: extra.anomalyNotifications ?? true,
    });
  }

  beforeEach(() => {
    store = new InMemoryStore();
    sendMessage = jest.fn().mockResolvedValue({ messageId: 10 });
    sender = { sendMessage };
  });

  describe('resolveRecipients', () => {
    it('should put the admin chat first and drop duplicates', async () => {
      await subscribe('100', null);
      await subscribe('200', 5);
      await subscribe('100', 5);
      const service = new NotificationService(store, sender, { adminChatId: '100' });

      expect(await service.resolveRecipients(5, 'down')).toEqual(['100', '200']);
    });

    it('should skip chats that muted the target', async () => {
      await subscribe('300', null);
      await subscribe('300', 5, { muted: true });
      const service = new NotificationService(store, sender, { adminChatId: '' });

      expect(await service.resolveRecipients(5, 'down')).toEqual([]);
      expect(await service.resolveRecipients(6, 'down')).toEqual(['300']);
    });

    it('should honour the anomaly preference', async () => {
      await subscribe('400', 5, { anomalyNotifications: false });
      await subscribe('500', 5);
      const service = new NotificationService(store, sender, { adminChatId: '' });

      expect(await service.resolveRecipients(5, 'anomaly')).toEqual(['500']);
      expect(await service.resolveRecipients(5, 'down')).toEqual(['400', '500']);
    });

    it('should only include global subscribers in the digest', async () => {
      await subscribe('600', null);
      await subscribe('700', 5);
      const service = new NotificationService(store, sender, { adminChatId: '' });

      expect(await service.resolveRecipients(null, 'digest')).toEqual(['600']);
    });

    it('should fall back to the admin chat when the store fails', async () => {
      jest.spyOn(store, 'listRecipients').mockRejectedValue(new Error('Database not connected'));
      const service = new NotificationService(store, sender, { adminChatId: '100' });

      expect(await service.resolveRecipients(5, 'down')).toEqual(['100']);
    });
  });

  describe('dispatch', () => {
    it('should send the formatted message to every recipient', async () => {
      await subscribe('200', 5);
      const service = new NotificationService(store, sender, { adminChatId: '100' });

      const summary = await service.dispatch(downEvent);

      expect(summary).toEqual({
        kind: 'down',
        recipients: 2,
        delivered: 2,
        failed: 0,
        results: [
          { status: 'delivered', recipientId: '100', messageId: 10 },
          { status: 'delivered', recipientId: '200', messageId: 10 },
        ],
      });
      expect(sendMessage).toHaveBeenCalledWith('100', expect.stringContaining('🔴 <b>DOWN: Search</b>'));
    });

    it('should keep delivering after one recipient fails', async () => {
      await subscribe('200', 5);
      sendMessage.mockRejectedValueOnce(new Error('Telegram API error: chat not found'));
      const service = new NotificationService(store, sender, { adminChatId: '100' });

      const summary = await service.dispatch(downEvent);

      expect(summary.delivered).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.results[0]).toEqual({
        status: 'failed',
        recipientId: '100',
        reason: 'Telegram API error: chat not found',
      });
    });

    it('should send a long digest as several messages', async () => {
      const service = new NotificationService(store, sender, { adminChatId: '100' }, new MessageFormatter(300));
      const stats = {
        since: new Date('2026-03-01T00:00:00Z'),
        totalChecks: 10,
        okChecks: 10,
        uptimePercent: 100,
        avgResponseTimeMs: 120,
        incidentCount: 0,
        totalDowntimeMs: 0,
        avgDowntimeMs: 0,
        anomalyCount: 0,
      };

      const summary = await service.dispatch({
        kind: 'digest',
        generatedAt: new Date('2026-03-02T09:00:00Z'),
        entries: [1, 2, 3].map((id) => ({ target: { id, name: `Service ${id}`, isUp: true }, stats })),
      });

      expect(sendMessage.mock.calls.length).toBeGreaterThan(1);
      expect(sendMessage.mock.calls.every(([chatId]) => chatId === '100')).toBe(true);
      expect(summary).toMatchObject({ recipients: 1, delivered: 1, failed: 0 });
    });

    it('should return an empty summary without recipients', async () => {
      const service = new NotificationService(store, sender, { adminChatId: '' });

      const summary = await service.dispatch(downEvent);

      expect(summary).toEqual({ kind: 'down', recipients: 0, delivered: 0, failed: 0, results: [] });
      expect(sendMessage).not.toHaveBeenCalled();
    });
  });
});
