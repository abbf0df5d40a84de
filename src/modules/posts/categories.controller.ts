import { Controller, Get, Param, Query, UseGuards } from '@nestjs/common';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import { AppConfigService } from '../app/app-config.service';
import { CurrentViewer } from '../viewer/viewer.decorator';
import type { Viewer } from '../viewer/viewer';
import { PostsService } from './posts.service';
import { toCategoryDto, toPostDto } from './post.dto';
import { pageRequestFromQuery, paginationMeta } from '../../common/pagination/page';

@Controller('categories')
export class CategoriesController {
  constructor(
    private readonly posts: PostsService,
    private readonly appConfig: AppConfigService,
  ) {}

  @UseGuards(OptionalAuthGuard)
  @Get(':slug/posts')
  async listPosts(@CurrentViewer() viewer: Viewer | null, @Param('slug') slug: string, @Query() query: unknown) {
    const { category, page } = await this.posts.listForCategory({
      viewer,
      slug,
      page: pageRequestFromQuery(query, this.appConfig.pageSize()),
    });
    return {
      data: {
        category: toCategoryDto(category),
        posts: page.items.map((p) => toPostDto(p, { viewerId: viewer?.id })),
      },
      pagination: paginationMeta(page),
    };
  }
}
