import { Module } from '@nestjs/common';
import { UploadsModule } from '../uploads/uploads.module';
import { FitsController } from './fits.controller';
import { FitsService } from './fits.service';

@Module({
  imports: [UploadsModule],
  controllers: [FitsController],
  providers: [FitsService],
  exports: [FitsService],
})
export class FitsModule {}
