import { Body, Controller, Delete, Get, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { z } from 'zod';
import { AuthGuard } from '../auth/auth.guard';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import { AppConfigService } from '../app/app-config.service';
import { toCommentDto } from '../comments/comment.dto';
import { CurrentViewer } from '../viewer/viewer.decorator';
import type { Viewer } from '../viewer/viewer';
import { PostsService } from './posts.service';
import { toPostDto } from './post.dto';
import { pageRequestFromQuery, paginationMeta } from '../../common/pagination/page';
import { MAX_ENTITY_ID, parseRouteId } from '../../common/params/route-id';
import { WRITE_THROTTLE } from '../../common/throttling/throttle-limits';

const nonBlank = (message: string) => z.string().refine((s) => s.trim().length > 0, { message });

const createSchema = z.object({
  title: z.string().trim().min(1, 'Title is required.').max(256),
  text: nonBlank('Text is required.'),
  imageRef: z.string().trim().max(500).nullish(),
  // Scheduling: a future pubDate keeps the post hidden until then.
  pubDate: z
    .string()
    .datetime({ offset: true })
    .transform((s) => new Date(s))
    .optional(),
  isPublished: z.boolean().optional(),
  categoryId: z.number().int().positive().max(MAX_ENTITY_ID).nullish(),
  locationId: z.number().int().positive().max(MAX_ENTITY_ID).nullish(),
});

const updateSchema = createSchema.partial();

@Controller('posts')
export class PostsController {
  constructor(
    private readonly posts: PostsService,
    private readonly appConfig: AppConfigService,
  ) {}

  @UseGuards(OptionalAuthGuard)
  @Get()
  async list(@CurrentViewer() viewer: Viewer | null, @Query() query: unknown) {
    const page = await this.posts.listIndex({
      viewer,
      page: pageRequestFromQuery(query, this.appConfig.pageSize()),
    });
    return {
      data: page.items.map((p) => toPostDto(p, { viewerId: viewer?.id })),
      pagination: paginationMeta(page),
    };
  }

  @UseGuards(OptionalAuthGuard)
  @Get(':id')
  async get(@CurrentViewer() viewer: Viewer | null, @Param('id') id: string) {
    const postId = parseRouteId(id, 'Post not found.');
    const { post, comments } = await this.posts.getDetail({ viewer, postId });
    return {
      data: {
        post: toPostDto(post, { viewerId: viewer?.id }),
        comments: comments.map(toCommentDto),
      },
    };
  }

  @UseGuards(AuthGuard)
  @Throttle(WRITE_THROTTLE)
  @Post()
  async create(@CurrentViewer() viewer: Viewer | null, @Body() body: unknown) {
    const input = createSchema.parse(body);
    const post = await this.posts.createPost({ viewer, input });
    return { data: toPostDto(post, { viewerId: viewer?.id }) };
  }

  @UseGuards(AuthGuard)
  @Throttle(WRITE_THROTTLE)
  @Patch(':id')
  async update(@CurrentViewer() viewer: Viewer | null, @Param('id') id: string, @Body() body: unknown) {
    const postId = parseRouteId(id, 'Post not found.');
    const patch = updateSchema.parse(body);
    const post = await this.posts.updatePost({ viewer, postId, patch });
    return { data: toPostDto(post, { viewerId: viewer?.id }) };
  }

  @UseGuards(AuthGuard)
  @Throttle(WRITE_THROTTLE)
  @Delete(':id')
  async remove(@CurrentViewer() viewer: Viewer | null, @Param('id') id: string) {
    const postId = parseRouteId(id, 'Post not found.');
    return { data: await this.posts.deletePost({ viewer, postId }) };
  }
}
