// __tests__/services/LineMessagingTransport.test.ts
import { Client } from '@line/bot-sdk';
import { LineMessagingTransport } from '@/services/LineMessagingTransport';

const mockPushMessage = jest.fn();

jest.mock('@line/bot-sdk', () => ({
  Client: jest.fn().mockImplementation(() => ({ pushMessage: mockPushMessage })),
}));

describe('LineMessagingTransport', () => {
  beforeEach(() => {
    mockPushMessage.mockReset();
  });

  it('should push a text message with the channel token', async () => {
    mockPushMessage.mockResolvedValueOnce({});
    const transport = new LineMessagingTransport('test-token');

    await expect(transport.send('U1', 'Checked in at 08:50.')).resolves.toEqual({
      success: true,
    });
    expect(Client).toHaveBeenCalledWith({ channelAccessToken: 'test-token' });
    expect(mockPushMessage).toHaveBeenCalledWith('U1', {
      type: 'text',
      text: 'Checked in at 08:50.',
    });
  });

  it('should report a rejected push as a failed dispatch', async () => {
    mockPushMessage.mockRejectedValueOnce(new Error('Request failed with status code 400'));
    const transport = new LineMessagingTransport('test-token');

    const result = await transport.send('U1', 'hello');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Request failed with status code 400');
  });

  it('should wrap non-error rejections', async () => {
    mockPushMessage.mockRejectedValueOnce('socket hang up');
    const transport = new LineMessagingTransport('test-token');

    const result = await transport.send('U1', 'hello');
    expect(!result.success && result.error.message).toBe('socket hang up');
  });
});
