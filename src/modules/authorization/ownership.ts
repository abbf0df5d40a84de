import type { Viewer } from '../viewer/viewer';

export type MutationAction = 'edit' | 'delete';

export type AuthorizationDecision = 'allowed' | 'denied_unauthenticated' | 'denied_not_owner';

/** What a denied non-owner gets back: a redirect to the entity's page, or a hard 403. */
export type DenialMode = 'redirect' | 'forbidden';

export type AuthorizationPolicy = {
  staffOverride: boolean;
  denialMode: DenialMode;
};

export const DEFAULT_AUTHORIZATION_POLICY: AuthorizationPolicy = {
  staffOverride: false,
  denialMode: 'forbidden',
};

export type OwnedEntity = { authorId: number };

/**
 * Ownership check for edit/delete. Transport-agnostic: returns the decision only.
 * The same rule applies to both actions; `action` is part of the contract so
 * callers and logs say what was attempted.
 */
export function authorize(
  viewer: Viewer | null,
  entity: OwnedEntity,
  _action: MutationAction,
  policy: AuthorizationPolicy = DEFAULT_AUTHORIZATION_POLICY,
): AuthorizationDecision {
  if (!viewer) return 'denied_unauthenticated';
  if (viewer.id === entity.authorId) return 'allowed';
  if (policy.staffOverride && viewer.isStaff) return 'allowed';
  return 'denied_not_owner';
}
