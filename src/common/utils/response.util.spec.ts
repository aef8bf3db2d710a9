import { failureResponse, successResponse } from './response.util';

describe('response envelopes', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-18T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('wraps data in a success envelope', () => {
    expect(successResponse({ id: 3 })).toEqual({
      success: true,
      data: { id: 3 },
      timestamp: '2026-03-18T12:00:00.000Z',
    });
  });

  it('wraps an error in a failure envelope', () => {
    expect(failureResponse({ title: 'Access denied', message: 'Nope' })).toEqual({
      success: false,
      error: { title: 'Access denied', message: 'Nope' },
      timestamp: '2026-03-18T12:00:00.000Z',
    });
  });
});
