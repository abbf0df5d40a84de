import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { VisibilityService } from './visibility.service';

@Module({
  imports: [StoreModule],
  providers: [VisibilityService],
  exports: [VisibilityService],
})
export class VisibilityModule {}
