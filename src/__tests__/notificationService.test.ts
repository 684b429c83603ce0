import { NotificationService } from '../services/notificationService';
import { NotificationStub, silentLogger, startNotificationStub, unreachableUrl } from './helpers';

describe('NotificationService', () => {
  const serviceFor = (baseUrl: string, timeoutMs = 1000) =>
    new NotificationService({ baseUrl, timeoutMs, logger: silentLogger });

  describe('against a live endpoint', () => {
    let stub: NotificationStub;

    afterEach(async () => {
      await stub.close();
    });

    it('posts the event type and data and reports delivery', async () => {
      stub = await startNotificationStub('accept');

      const delivered = await serviceFor(stub.url).notify('prescription_created', { prescription_id: 3 });

      expect(delivered).toBe(true);
      expect(stub.received).toEqual([{ event_type: 'prescription_created', data: { prescription_id: 3 } }]);
    });

    it('resolves false on an error status', async () => {
      stub = await startNotificationStub('fail');

      await expect(serviceFor(stub.url).notify('prescription_created', {})).resolves.toBe(false);
    });

    it('resolves false when the endpoint times out', async () => {
      stub = await startNotificationStub('hang');

      await expect(serviceFor(stub.url, 50).notify('prescription_created', {})).resolves.toBe(false);
    });
  });

  it('resolves false when the endpoint is unreachable', async () => {
    const service = serviceFor(await unreachableUrl());

    await expect(service.notify('prescription_created', {})).resolves.toBe(false);
  });

  it('logs the failure as a warning', async () => {
    const logger = silentLogger.child({});
    const warn = jest.spyOn(logger, 'warn');
    const service = new NotificationService({ baseUrl: await unreachableUrl(), timeoutMs: 1000, logger });

    await service.notify('prescription_created', { prescription_id: 1 });

    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ eventType: 'prescription_created' }),
      'notification_failed'
    );
  });
});
