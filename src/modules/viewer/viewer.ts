import type { Account } from '../store/blog-store';

/** The acting identity for one request. Anonymous viewers are `null`. */
export type Viewer = {
  id: number;
  username: string;
  isStaff: boolean;
};

export function toViewer(account: Pick<Account, 'id' | 'username' | 'isStaff'>): Viewer {
  return { id: account.id, username: account.username, isStaff: account.isStaff };
}

export function isViewerAccount(viewer: Viewer | null, accountId: number): boolean {
  return Boolean(viewer && viewer.id === accountId);
}
