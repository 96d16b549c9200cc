import { NotificationService, SmsOutcome, SmsTransport, TextbeltTransport } from '../notificationService';
import { Booking, Subject, Tutor } from '../../types';
import { NotificationFailure } from '../../utils/errors';

interface FetchCall {
  url: string;
  body: URLSearchParams;
}

function fakeFetch(respond: () => Promise<Response>) {
  const calls: FetchCall[] = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), body: new URLSearchParams(String(init?.body)) });
    return respond();
  };
  return { impl, calls };
}

const json = (body: unknown, status = 200) => async () => new Response(JSON.stringify(body), { status });

const textbelt = { apiKey: 'test-secret', url: 'https://sms.example.test/text', sender: 'Peer Tutoring' };

describe('TextbeltTransport', () => {
  it('should skip sending without an API key', async () => {
    const fetchMock = fakeFetch(json({ success: true }));
    const transport = new TextbeltTransport({ ...textbelt, apiKey: '' }, fetchMock.impl);

    await expect(transport.send('+15551234567', 'hello')).resolves.toBe('skipped');
    expect(fetchMock.calls).toHaveLength(0);
  });

  it('should post the message form to the provider', async () => {
    const fetchMock = fakeFetch(json({ success: true, textId: '42' }));
    const transport = new TextbeltTransport(textbelt, fetchMock.impl);

    await expect(transport.send('+15551234567', 'See you at 3')).resolves.toBe('sent');
    expect(fetchMock.calls).toHaveLength(1);
    expect(fetchMock.calls[0].url).toBe('https://sms.example.test/text');
    expect(Object.fromEntries(fetchMock.calls[0].body)).toEqual({
      phone: '+15551234567',
      message: 'See you at 3',
      sender: 'Peer Tutoring',
      key: 'test-secret',
    });
  });

  it('should fail on an HTTP error', async () => {
    const transport = new TextbeltTransport(textbelt, fakeFetch(json({}, 500)).impl);
    await expect(transport.send('+15551234567', 'x')).rejects.toThrow('SMS provider answered HTTP 500 for +15551234567');
  });

  it('should fail when the provider rejects the message', async () => {
    const transport = new TextbeltTransport(textbelt, fakeFetch(json({ success: false, error: 'Out of quota' })).impl);
    await expect(transport.send('+15551234567', 'x')).rejects.toThrow(NotificationFailure);
  });

  it('should fail on a body that is not JSON', async () => {
    const transport = new TextbeltTransport(textbelt, fakeFetch(async () => new Response('<html>', { status: 200 })).impl);
    await expect(transport.send('+15551234567', 'x')).rejects.toThrow(
      'SMS provider sent an unreadable response for +15551234567'
    );
  });

  it('should wrap network errors', async () => {
    const transport = new TextbeltTransport(
      textbelt,
      fakeFetch(async () => {
        throw new Error('socket hang up');
      }).impl
    );
    await expect(transport.send('+15551234567', 'x')).rejects.toThrow('SMS request to +15551234567 failed: socket hang up');
  });
});

describe('NotificationService', () => {
  const tutor: Tutor = {
    id: 'tutor-1',
    name: 'Ana',
    phone: '5550001111',
    isActive: true,
    subjectIds: ['biology'],
    createdAt: '2026-01-01T00:00:00.000Z',
  };
  const subject: Subject = { id: 'biology', name: 'Biology', category: 'Science', sortOrder: 1, slotMinutes: null };
  const booking: Booking = {
    id: 'booking-1',
    subjectId: 'biology',
    tutorId: 'tutor-1',
    studentName: 'Sam',
    studentPhone: '5559876543',
    date: '2026-03-02',
    startTime: '15:00',
    endTime: '15:30',
    status: 'confirmed',
    createdAt: '2026-03-01T18:00:00.000Z',
    reminderSentAt: null,
    cancelledAt: null,
    cancelReason: null,
    cancelledBy: null,
  };

  function transportReturning(outcomes: Array<SmsOutcome | Error>): SmsTransport {
    const queue = [...outcomes];
    return {
      send: async () => {
        const next = queue.shift() ?? 'sent';
        if (next instanceof Error) throw next;
        return next;
      },
    };
  }

  it('should count sent and skipped messages', async () => {
    const service = new NotificationService(transportReturning(['sent', 'skipped']), 'Peer Tutoring');
    await expect(service.bookingConfirmed(booking, tutor, subject)).resolves.toEqual({ sent: 1, skipped: 1, warnings: [] });
  });

  it('should turn failures into warnings and keep going', async () => {
    const service = new NotificationService(
      transportReturning([new NotificationFailure('SMS provider answered HTTP 503 for +15559876543'), new Error('boom')]),
      'Peer Tutoring'
    );

    await expect(service.bookingConfirmed(booking, tutor, subject)).resolves.toEqual({
      sent: 0,
      skipped: 0,
      warnings: ['SMS provider answered HTTP 503 for +15559876543', 'Unexpected notification error: boom'],
    });
  });

  it('should text only the student on cancellation', async () => {
    const sent: string[] = [];
    const service = new NotificationService(
      {
        send: async (phone) => {
          sent.push(phone);
          return 'sent';
        },
      },
      'Peer Tutoring'
    );

    await service.bookingCancelled(booking, tutor);

    expect(sent).toEqual(['+15559876543']);
  });
});
