import type { Account } from '../store/blog-store';
import { displayName } from '../posts/post.dto';

export type ProfileDto = {
  id: number;
  username: string;
  name: string;
  firstName: string;
  lastName: string;
  isStaff: boolean;
  /** Only on the owner's own profile. */
  email?: string;
};

export function toProfileDto(account: Account, opts: { includeEmail: boolean }): ProfileDto {
  return {
    id: account.id,
    username: account.username,
    name: displayName(account),
    firstName: account.firstName,
    lastName: account.lastName,
    isStaff: account.isStaff,
    ...(opts.includeEmail ? { email: account.email } : {}),
  };
}
