import { authorize } from './ownership';
import type { Viewer } from '../viewer/viewer';

const author: Viewer = { id: 1, username: 'author', isStaff: false };
const stranger: Viewer = { id: 2, username: 'stranger', isStaff: false };
const staff: Viewer = { id: 3, username: 'staff', isStaff: true };
const post = { authorId: 1 };

describe('authorize', () => {
  it.each(['edit', 'delete'] as const)('denies anonymous viewers (%s)', (action) => {
    expect(authorize(null, post, action)).toBe('denied_unauthenticated');
  });

  it.each(['edit', 'delete'] as const)('allows the author (%s)', (action) => {
    expect(authorize(author, post, action)).toBe('allowed');
  });

  it('denies other accounts', () => {
    expect(authorize(stranger, post, 'edit')).toBe('denied_not_owner');
  });

  it('does not let staff bypass ownership by default', () => {
    expect(authorize(staff, post, 'delete')).toBe('denied_not_owner');
  });

  it('lets staff bypass ownership when the override is on', () => {
    expect(authorize(staff, post, 'delete', { staffOverride: true, denialMode: 'forbidden' })).toBe('allowed');
    expect(authorize(stranger, post, 'delete', { staffOverride: true, denialMode: 'forbidden' })).toBe(
      'denied_not_owner',
    );
  });

  it('still requires an identity under the staff override', () => {
    expect(authorize(null, post, 'edit', { staffOverride: true, denialMode: 'redirect' })).toBe(
      'denied_unauthenticated',
    );
  });
});
