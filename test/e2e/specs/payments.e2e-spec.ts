import request from 'supertest';

import { type TestApp, createTestApp } from '../helpers/test-app';
import { type PupilBody, type Session, TestHelper } from '../helpers/test-helper';

interface PaymentBody {
  id: number;
  pupilId: number;
  amount: string;
  month: number;
  year: number;
}

describe('Payments (e2e)', () => {
  let testApp: TestApp;
  let helper: TestHelper;
  let owner: Session;
  let stranger: Session;
  let pupil: PupilBody;
  let sibling: PupilBody;
  let foreign: PupilBody;

  const payFor = (pupilId: number, overrides: Record<string, unknown> = {}) => ({
    pupilId,
    amount: 1500,
    month: 3,
    year: 2026,
    paymentDate: '2026-03-05',
    paymentMode: 'upi',
    ...overrides,
  });

  beforeAll(async () => {
    testApp = await createTestApp();
    helper = new TestHelper(testApp.app);
    owner = await helper.login('priya');
    stranger = await helper.login('stan');
    pupil = await helper.createPupil(owner);
    sibling = await helper.createPupil(owner);
    foreign = await helper.createPupil(stranger);
  });

  afterAll(async () => {
    await testApp.close();
  });

  describe('/api/payments (POST)', () => {
    it('records a payment with a two-decimal amount', async () => {
      const res = await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(owner))
        .send(payFor(pupil.id, { notes: 'March fee' }))
        .expect(201);

      expect(res.body.data).toMatchObject({
        pupilId: pupil.id,
        amount: '1500.00',
        month: 3,
        year: 2026,
        paymentDate: '2026-03-05',
        paymentMode: 'upi',
        notes: 'March fee',
      });
    });

    it.each([
      [{ amount: 0 }, /^amount: /],
      [{ amount: 10.005 }, /^amount: /],
      [{ month: 13 }, /^month: /],
      [{ year: 1899 }, /^year: /],
      [{ paymentMode: 'crypto' }, /^paymentMode: /],
    ])('rejects %o', async (overrides, pattern) => {
      const res = await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(owner))
        .send(payFor(pupil.id, overrides))
        .expect(400);
      expect(res.body.error.title).toBe('Validation error');
      expect(res.body.error.message).toMatch(pattern);
    });

    it('refuses a payment for another user pupil', async () => {
      const res = await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(owner))
        .send(payFor(foreign.id))
        .expect(403);
      expect(res.body.error.message).toBe('Not authorized to access this pupil');
    });

    it('refuses a payment for an unknown pupil', async () => {
      const res = await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(owner))
        .send(payFor(999999))
        .expect(404);
      expect(res.body.error.message).toBe('Pupil not found');
    });
  });

  describe('queries', () => {
    beforeAll(async () => {
      await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(owner))
        .send(payFor(pupil.id, { month: 4, amount: 1600 }))
        .expect(201);
      await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(owner))
        .send(payFor(sibling.id, { amount: 900 }))
        .expect(201);
      await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(stranger))
        .send(payFor(foreign.id, { amount: 50 }))
        .expect(201);
    });

    it('/api/payments (GET) lists payments of the caller pupils', async () => {
      const res = await request(helper.server)
        .get('/api/payments')
        .set(helper.auth(owner))
        .expect(200);
      expect(res.body.data.map((p: PaymentBody) => p.amount)).toEqual([
        '1500.00',
        '1600.00',
        '900.00',
      ]);
    });

    it('/api/payments (GET) filters by pupil, month and year', async () => {
      const res = await request(helper.server)
        .get(`/api/payments?pupilId=${pupil.id}&month=4&year=2026`)
        .set(helper.auth(owner))
        .expect(200);
      expect(res.body.data.map((p: PaymentBody) => p.amount)).toEqual(['1600.00']);
    });

    it('/api/payments/pupil/:pupilId (GET) lists one pupil payments', async () => {
      const res = await request(helper.server)
        .get(`/api/payments/pupil/${sibling.id}`)
        .set(helper.auth(owner))
        .expect(200);
      expect(res.body.data.map((p: PaymentBody) => p.amount)).toEqual(['900.00']);

      await request(helper.server)
        .get(`/api/payments/pupil/${foreign.id}`)
        .set(helper.auth(owner))
        .expect(403);
    });

    it('/api/payments/pupil/:pupilId/month/:year/:month (GET) narrows to a month', async () => {
      const res = await request(helper.server)
        .get(`/api/payments/pupil/${pupil.id}/month/2026/3`)
        .set(helper.auth(owner))
        .expect(200);
      expect(res.body.data.map((p: PaymentBody) => p.amount)).toEqual(['1500.00']);
    });

    it('/api/payments/pupil/:pupilId/month/:year/:month (GET) checks the period', async () => {
      const badMonth = await request(helper.server)
        .get(`/api/payments/pupil/${pupil.id}/month/2026/13`)
        .set(helper.auth(owner))
        .expect(400);
      expect(badMonth.body.error.message).toBe('Month must be between 1 and 12');

      const badYear = await request(helper.server)
        .get(`/api/payments/pupil/${pupil.id}/month/1850/3`)
        .set(helper.auth(owner))
        .expect(400);
      expect(badYear.body.error.message).toBe('Year must be 1900 or later');
    });
  });

  describe('single payment', () => {
    let payment: PaymentBody;

    beforeAll(async () => {
      const res = await request(helper.server)
        .post('/api/payments')
        .set(helper.auth(owner))
        .send(payFor(pupil.id, { month: 5 }))
        .expect(201);
      payment = res.body.data;
    });

    it('/api/payments/:id (GET) hides payments of other users', async () => {
      const res = await request(helper.server)
        .get(`/api/payments/${payment.id}`)
        .set(helper.auth(stranger))
        .expect(403);
      expect(res.body.error.message).toBe('Not authorized to access this payment');

      await request(helper.server)
        .get('/api/payments/999999')
        .set(helper.auth(owner))
        .expect(404);
    });

    it('/api/payments/:id (PUT) updates the amount', async () => {
      const res = await request(helper.server)
        .put(`/api/payments/${payment.id}`)
        .set(helper.auth(owner))
        .send({ amount: 1750.5, paymentMode: 'cash' })
        .expect(200);
      expect(res.body.data).toMatchObject({
        id: payment.id,
        amount: '1750.50',
        paymentMode: 'cash',
        month: 5,
      });
    });

    it('/api/payments/:id (PUT) forbids another user', async () => {
      const res = await request(helper.server)
        .put(`/api/payments/${payment.id}`)
        .set(helper.auth(stranger))
        .send({ amount: 1 })
        .expect(403);
      expect(res.body.error.message).toBe('Not authorized to update this payment');
    });

    it('/api/payments/:id (DELETE) deletes the payment', async () => {
      const res = await request(helper.server)
        .delete(`/api/payments/${payment.id}`)
        .set(helper.auth(owner))
        .expect(200);
      expect(res.body.data).toEqual({ message: 'Payment deleted successfully' });

      const missing = await request(helper.server)
        .get(`/api/payments/${payment.id}`)
        .set(helper.auth(owner))
        .expect(404);
      expect(missing.body.error.message).toBe('Payment not found');
    });
  });
});
