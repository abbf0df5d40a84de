import { Body, Controller, Delete, Get, Param, Patch, Post, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { z } from 'zod';
import { AuthGuard } from '../auth/auth.guard';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import { CurrentViewer } from '../viewer/viewer.decorator';
import type { Viewer } from '../viewer/viewer';
import { CommentsService } from './comments.service';
import { toCommentDto } from './comment.dto';
import { parseRouteId } from '../../common/params/route-id';
import { WRITE_THROTTLE } from '../../common/throttling/throttle-limits';

// Blank text is rejected by the service after trimming.
const textSchema = z.object({
  text: z.string().max(5000),
});

@Controller('posts/:id/comments')
export class CommentsController {
  constructor(private readonly comments: CommentsService) {}

  @UseGuards(OptionalAuthGuard)
  @Get()
  async list(@CurrentViewer() viewer: Viewer | null, @Param('id') id: string) {
    const postId = parseRouteId(id, 'Post not found.');
    const thread = await this.comments.listForPost({ viewer, postId });
    return { data: thread.map(toCommentDto) };
  }

  @UseGuards(AuthGuard)
  @Throttle(WRITE_THROTTLE)
  @Post()
  async add(@CurrentViewer() viewer: Viewer | null, @Param('id') id: string, @Body() body: unknown) {
    const postId = parseRouteId(id, 'Post not found.');
    const { text } = textSchema.parse(body);
    const comment = await this.comments.addComment({ viewer, postId, text });
    return { data: toCommentDto(comment) };
  }

  @UseGuards(AuthGuard)
  @Throttle(WRITE_THROTTLE)
  @Patch(':commentId')
  async edit(
    @CurrentViewer() viewer: Viewer | null,
    @Param('id') id: string,
    @Param('commentId') commentIdRaw: string,
    @Body() body: unknown,
  ) {
    const postId = parseRouteId(id, 'Post not found.');
    const commentId = parseRouteId(commentIdRaw, 'Comment not found.');
    const { text } = textSchema.parse(body);
    const comment = await this.comments.editComment({ viewer, postId, commentId, text });
    return { data: toCommentDto(comment) };
  }

  @UseGuards(AuthGuard)
  @Throttle(WRITE_THROTTLE)
  @Delete(':commentId')
  async remove(@CurrentViewer() viewer: Viewer | null, @Param('id') id: string, @Param('commentId') commentIdRaw: string) {
    const postId = parseRouteId(id, 'Post not found.');
    const commentId = parseRouteId(commentIdRaw, 'Comment not found.');
    return { data: await this.comments.deleteComment({ viewer, postId, commentId }) };
  }
}
