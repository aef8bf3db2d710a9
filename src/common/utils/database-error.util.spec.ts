import { findDatabaseError } from './database-error.util';

describe('findDatabaseError', () => {
  it('returns an error that carries a SQLSTATE', () => {
    const error = Object.assign(new Error('duplicate key'), {
      code: '23505',
      constraint: 'users_email_unique',
    });

    expect(findDatabaseError(error)).toBe(error);
  });

  it('unwraps the cause of a query wrapper', () => {
    const driverError = Object.assign(new Error('fk'), { code: '23503' });
    const wrapper = new Error('Failed query: insert into ...', { cause: driverError });

    expect(findDatabaseError(wrapper)).toBe(driverError);
  });

  it('ignores codes that are not SQLSTATEs', () => {
    const error = Object.assign(new Error('socket'), { code: 'ECONNREFUSED' });

    expect(findDatabaseError(error)).toBeUndefined();
  });

  it('ignores non-error values', () => {
    expect(findDatabaseError('boom')).toBeUndefined();
    expect(findDatabaseError(undefined)).toBeUndefined();
  });
});
