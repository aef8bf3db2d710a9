import { HashingService } from './hashing.service';

describe('HashingService', () => {
  const service = new HashingService();

  it('accepts the value that was hashed', async () => {
    const hash = await service.hash('header.payload-one.signature');

    expect(hash).not.toContain('payload-one');
    await expect(service.compare('header.payload-one.signature', hash)).resolves.toBe(true);
  });

  it('tells apart values that share a long prefix', async () => {
    const prefix = 'x'.repeat(100);
    const hash = await service.hash(`${prefix}-first`);

    await expect(service.compare(`${prefix}-second`, hash)).resolves.toBe(false);
  });
});
