import type { CommentRecord } from '../store/blog-store';
import { toAuthorDto, type PostAuthorDto } from '../posts/post.dto';

export type CommentDto = {
  id: number;
  postId: number;
  text: string;
  createdAt: string;
  author: PostAuthorDto;
};

export function toCommentDto(comment: CommentRecord): CommentDto {
  return {
    id: comment.id,
    postId: comment.postId,
    text: comment.text,
    createdAt: comment.createdAt.toISOString(),
    author: toAuthorDto(comment.author),
  };
}
