import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CategoriesModule } from '../categories/categories.module';
import { multerConfig } from '../common/utils/multer.config';
import { complaintsConfig, ComplaintsConfig } from '../config/configuration';
import { Feedback } from '../feedback/entity/feedback.entity';
import { NotificationModule } from '../notification/notification.module';
import { ComplaintHistoryService } from './complaint-history.service';
import { ComplaintNumberService } from './complaint-number.service';
import { ComplaintReportsService } from './complaint-reports.service';
import { ComplaintsController } from './complaints.controller';
import { ComplaintsService } from './complaints.service';
import { ComplaintAttachment } from './entity/complaint-attachment.entity';
import { ComplaintHistory } from './entity/complaint-history.entity';
import { ComplaintSequence } from './entity/complaint-sequence.entity';
import { Complaint } from './entity/complaints.entity';
import { ComplaintHistorySubscriber } from './subscribers/complaint-history.subscriber';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Complaint,
      ComplaintHistory,
      ComplaintSequence,
      ComplaintAttachment,
      Feedback,
    ]),
    MulterModule.registerAsync({
      inject: [complaintsConfig.KEY],
      useFactory: (config: ComplaintsConfig) => multerConfig(config),
    }),
    CategoriesModule,
    NotificationModule,
  ],
  controllers: [ComplaintsController],
  providers: [
    ComplaintsService,
    ComplaintReportsService,
    ComplaintNumberService,
    ComplaintHistoryService,
    ComplaintHistorySubscriber,
  ],
  exports: [ComplaintsService],
})
export class ComplaintsModule {}
