import { Body, Controller, Get, Param, Patch, Query, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { z } from 'zod';
import { AuthGuard } from '../auth/auth.guard';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import { AppConfigService } from '../app/app-config.service';
import { toPostDto } from '../posts/post.dto';
import { CurrentViewer } from '../viewer/viewer.decorator';
import type { Viewer } from '../viewer/viewer';
import { UsersService } from './users.service';
import { toProfileDto } from './user.dto';
import { pageRequestFromQuery, paginationMeta } from '../../common/pagination/page';
import { WRITE_THROTTLE } from '../../common/throttling/throttle-limits';

const profileSchema = z.object({
  firstName: z.string().trim().max(150).optional(),
  lastName: z.string().trim().max(150).optional(),
  email: z.union([z.string().trim().email(), z.literal('')]).optional(),
});

@Controller('users')
export class UsersController {
  constructor(
    private readonly users: UsersService,
    private readonly appConfig: AppConfigService,
  ) {}

  @UseGuards(AuthGuard)
  @Get('me')
  async me(@CurrentViewer() viewer: Viewer | null) {
    const account = await this.users.me(viewer);
    return { data: { user: toProfileDto(account, { includeEmail: true }) } };
  }

  @UseGuards(AuthGuard)
  @Throttle(WRITE_THROTTLE)
  @Patch('me')
  async updateMe(@CurrentViewer() viewer: Viewer | null, @Body() body: unknown) {
    const parsed = profileSchema.parse(body);
    const updated = await this.users.updateOwnProfile(viewer, {
      firstName: parsed.firstName,
      lastName: parsed.lastName,
      email: parsed.email === undefined ? undefined : parsed.email.toLowerCase(),
    });
    return { data: { user: toProfileDto(updated, { includeEmail: true }) } };
  }

  @UseGuards(OptionalAuthGuard)
  @Get(':username/posts')
  async profile(@CurrentViewer() viewer: Viewer | null, @Param('username') username: string, @Query() query: unknown) {
    const { account, isOwner, page } = await this.users.getProfile({
      viewer,
      username,
      page: pageRequestFromQuery(query, this.appConfig.pageSize()),
    });
    return {
      data: {
        user: toProfileDto(account, { includeEmail: isOwner }),
        isOwner,
        posts: page.items.map((p) => toPostDto(p, { viewerId: viewer?.id })),
      },
      pagination: paginationMeta(page),
    };
  }
}
