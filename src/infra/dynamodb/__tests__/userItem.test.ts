import { describe, it, expect } from 'vitest';
import { User } from '../../../domain/users/user.js';
import { emailGuardKey, fromUserItem, guardOwner, toEmailGuardItem, toUserItem } from '../userItem.js';

describe('user item mapping', () => {
  const user = User.restore({
    id: '7d3f7a52-3a0e-4b1a-9d55-0d0f3f1b2c4e',
    email: 'grace@example.com',
    name: 'Grace',
    active: false,
    createdAt: new Date('2024-04-01T09:00:00.000Z'),
    updatedAt: new Date('2024-04-02T09:00:00.000Z'),
  });

  it('should write a user as a typed item with ISO timestamps', () => {
    expect(toUserItem(user)).toEqual({
      id: '7d3f7a52-3a0e-4b1a-9d55-0d0f3f1b2c4e',
      entityType: 'user',
      email: 'grace@example.com',
      name: 'Grace',
      active: false,
      createdAt: '2024-04-01T09:00:00.000Z',
      updatedAt: '2024-04-02T09:00:00.000Z',
    });
  });

  it('should key the email guard by the normalized email', () => {
    expect(emailGuardKey('grace@example.com')).toBe('email#grace@example.com');
    expect(toEmailGuardItem(user)).toEqual({
      id: 'email#grace@example.com',
      entityType: 'email',
      userId: '7d3f7a52-3a0e-4b1a-9d55-0d0f3f1b2c4e',
    });
  });

  it('should read back a written item', () => {
    const restored = fromUserItem({ ...toUserItem(user) });

    expect(restored?.toJSON()).toEqual(user.toJSON());
  });

  it('should reject guard items and malformed items', () => {
    expect(fromUserItem({ ...toEmailGuardItem(user) })).toBeNull();
    expect(fromUserItem({ ...toUserItem(user), active: 'yes' })).toBeNull();
    expect(fromUserItem({ ...toUserItem(user), createdAt: 'yesterday' })).toBeNull();
  });

  it('should read the owner of an email guard item only', () => {
    expect(guardOwner({ id: 'email#a@example.com', entityType: 'email', userId: 'user-9' })).toBe('user-9');
    expect(guardOwner({ id: 'user-9', entityType: 'user', email: 'a@example.com' })).toBeNull();
  });
});
