import { Module } from '@nestjs/common';
import { BLOG_STORE } from './blog-store';
import { PgBlogStore } from './pg-blog.store';

@Module({
  providers: [{ provide: BLOG_STORE, useClass: PgBlogStore }],
  exports: [BLOG_STORE],
})
export class StoreModule {}
