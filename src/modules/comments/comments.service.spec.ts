import { BadRequestException, ForbiddenException, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { AuthorizationService } from '../authorization/authorization.service';
import { RedirectException } from '../authorization/redirect.exception';
import { VisibilityService } from '../visibility/visibility.service';
import { toViewer } from '../viewer/viewer';
import { CommentsService } from './comments.service';
import { InMemoryBlogStore, daysFromNow } from '../../../test/support/in-memory-blog-store';
import { makeAppConfig } from '../../../test/support/config';

function setup(env: Record<string, string> = {}) {
  const store = new InMemoryBlogStore();
  const appConfig = makeAppConfig(env);
  const svc = new CommentsService(store, new VisibilityService(store, appConfig), new AuthorizationService(appConfig));
  const author = store.addAccount({ username: 'author' });
  const reader = store.addAccount({ username: 'reader' });
  const post = store.addPost({ authorId: author.id });
  return { store, svc, author, reader, post };
}

describe('CommentsService.addComment', () => {
  it('creates a trimmed comment owned by the viewer', async () => {
    const { store, svc, reader, post } = setup();
    const comment = await svc.addComment({ viewer: toViewer(reader), postId: post.id, text: '  hello there  ' });

    expect(comment).toMatchObject({ postId: post.id, authorId: reader.id, text: 'hello there' });
    expect(store.commentCountFor(post.id)).toBe(1);
  });

  it('is NotFound for a missing post and creates nothing', async () => {
    const { store, svc, reader } = setup();
    await expect(svc.addComment({ viewer: toViewer(reader), postId: 9999, text: 'hi' })).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(store.commentCountFor(9999)).toBe(0);
  });

  it('rejects blank text without creating a comment', async () => {
    const { store, svc, reader, post } = setup();
    await expect(svc.addComment({ viewer: toViewer(reader), postId: post.id, text: '   ' })).rejects.toBeInstanceOf(
      BadRequestException,
    );
    expect(store.commentCountFor(post.id)).toBe(0);
  });

  it('requires a signed-in viewer before anything else', async () => {
    const { svc } = setup();
    await expect(svc.addComment({ viewer: null, postId: 9999, text: '' })).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
  });

  it('accepts comments on posts that are not yet public', async () => {
    const { store, svc, author, reader } = setup();
    const scheduled = store.addPost({ authorId: author.id, pubDate: daysFromNow(2) });
    const comment = await svc.addComment({ viewer: toViewer(reader), postId: scheduled.id, text: 'early' });
    expect(comment.postId).toBe(scheduled.id);
  });
});

describe('CommentsService threads', () => {
  it('lists comments oldest first with id tie-break', async () => {
    const { store, svc, author, reader, post } = setup();
    const at = new Date('2026-02-01T10:00:00.000Z');
    store.addComment({ id: 50, postId: post.id, authorId: reader.id, createdAt: at });
    store.addComment({ id: 40, postId: post.id, authorId: author.id, createdAt: at });
    store.addComment({ id: 60, postId: post.id, authorId: reader.id, createdAt: new Date('2026-01-31T10:00:00.000Z') });

    const thread = await svc.listForPost({ viewer: null, postId: post.id });
    expect(thread.map((c) => c.id)).toEqual([60, 40, 50]);
  });

  it('hides the thread of a post the viewer cannot see', async () => {
    const { store, svc, author, reader } = setup();
    const draft = store.addPost({ authorId: author.id, isPublished: false });
    await expect(svc.listForPost({ viewer: toViewer(reader), postId: draft.id })).rejects.toThrow('Post not found.');
  });
});

describe('CommentsService edit/delete', () => {
  it('lets the comment author edit their comment', async () => {
    const { store, svc, reader, post } = setup();
    const c = store.addComment({ postId: post.id, authorId: reader.id, text: 'first' });

    const updated = await svc.editComment({ viewer: toViewer(reader), postId: post.id, commentId: c.id, text: ' second ' });
    expect(updated.text).toBe('second');
  });

  it('forbids the post author from editing someone else’s comment', async () => {
    const { store, svc, author, reader, post } = setup();
    const c = store.addComment({ postId: post.id, authorId: reader.id });

    await expect(
      svc.editComment({ viewer: toViewer(author), postId: post.id, commentId: c.id, text: 'mine now' }),
    ).rejects.toBeInstanceOf(ForbiddenException);
  });

  it('redirects non-owners back to the post in redirect mode', async () => {
    const { store, svc, author, reader, post } = setup({ AUTH_DENIAL_MODE: 'redirect' });
    const c = store.addComment({ postId: post.id, authorId: reader.id });

    const err = await svc.deleteComment({ viewer: toViewer(author), postId: post.id, commentId: c.id }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RedirectException);
    expect(err instanceof RedirectException && err.location).toBe(`/posts/${post.id}`);
    expect(store.commentCountFor(post.id)).toBe(1);
  });

  it('is NotFound for a non-owner touching a comment on a post they cannot see', async () => {
    const { store, svc, author, reader } = setup();
    const stranger = store.addAccount({ username: 'stranger' });
    const draft = store.addPost({ authorId: author.id, isPublished: false });
    const c = store.addComment({ postId: draft.id, authorId: reader.id });

    await expect(
      svc.deleteComment({ viewer: toViewer(stranger), postId: draft.id, commentId: c.id }),
    ).rejects.toThrow('Comment not found.');
    await expect(
      svc.editComment({ viewer: toViewer(stranger), postId: draft.id, commentId: c.id, text: 'x' }),
    ).rejects.toBeInstanceOf(NotFoundException);
    expect(store.commentCountFor(draft.id)).toBe(1);
  });

  it('still lets the comment author delete their comment on a hidden post', async () => {
    const { store, svc, author, reader } = setup();
    const draft = store.addPost({ authorId: author.id, isPublished: false });
    const c = store.addComment({ postId: draft.id, authorId: reader.id });

    await expect(svc.deleteComment({ viewer: toViewer(reader), postId: draft.id, commentId: c.id })).resolves.toEqual({
      success: true,
    });
  });

  it('denies the post author with 403 on someone else’s comment on their own draft', async () => {
    const { store, svc, author, reader } = setup();
    const draft = store.addPost({ authorId: author.id, isPublished: false });
    const c = store.addComment({ postId: draft.id, authorId: reader.id });

    await expect(
      svc.deleteComment({ viewer: toViewer(author), postId: draft.id, commentId: c.id }),
    ).rejects.toBeInstanceOf(ForbiddenException);
  });

  it('is 401 for anonymous viewers', async () => {
    const { store, svc, reader, post } = setup();
    const c = store.addComment({ postId: post.id, authorId: reader.id });
    await expect(svc.deleteComment({ viewer: null, postId: post.id, commentId: c.id })).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
  });

  it('is NotFound when the comment belongs to another post', async () => {
    const { store, svc, author, reader, post } = setup();
    const other = store.addPost({ authorId: author.id });
    const c = store.addComment({ postId: other.id, authorId: reader.id });

    await expect(
      svc.deleteComment({ viewer: toViewer(reader), postId: post.id, commentId: c.id }),
    ).rejects.toThrow('Comment not found.');
  });

  it('deletes once, then reports NotFound', async () => {
    const { store, svc, reader, post } = setup();
    const c = store.addComment({ postId: post.id, authorId: reader.id });

    await expect(svc.deleteComment({ viewer: toViewer(reader), postId: post.id, commentId: c.id })).resolves.toEqual({
      success: true,
    });
    await expect(
      svc.deleteComment({ viewer: toViewer(reader), postId: post.id, commentId: c.id }),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('rejects blank edits and keeps the old text', async () => {
    const { store, svc, reader, post } = setup();
    const c = store.addComment({ postId: post.id, authorId: reader.id, text: 'keep me' });

    await expect(
      svc.editComment({ viewer: toViewer(reader), postId: post.id, commentId: c.id, text: '' }),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect((await store.findCommentById(c.id))?.text).toBe('keep me');
  });
});
