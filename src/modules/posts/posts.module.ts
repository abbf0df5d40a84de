import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { AuthorizationModule } from '../authorization/authorization.module';
import { CommentsModule } from '../comments/comments.module';
import { StoreModule } from '../store/store.module';
import { VisibilityModule } from '../visibility/visibility.module';
import { CategoriesController } from './categories.controller';
import { PostsController } from './posts.controller';
import { PostsService } from './posts.service';

@Module({
  imports: [AuthModule, StoreModule, VisibilityModule, AuthorizationModule, CommentsModule],
  controllers: [PostsController, CategoriesController],
  providers: [PostsService],
  exports: [PostsService],
})
export class PostsModule {}
