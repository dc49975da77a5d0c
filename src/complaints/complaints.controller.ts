import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { rm } from 'fs/promises';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { UserRoleType } from '../common/enums/user-role.enum';
import { ValidationError } from '../common/exceptions/domain.exceptions';
import { RolesGuard } from '../common/guards/roles.guard';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { ComplaintReportsService } from './complaint-reports.service';
import { ComplaintsService } from './complaints.service';
import {
  AssignComplaintDto,
  AttachmentRef,
  CreateComplaintsDto,
  ExportComplaintsDto,
  ListComplaintsQueryDto,
  ReopenComplaintDto,
  UpdateComplaintDetailsDto,
  UpdateComplaintPriorityDto,
  UpdateComplaintStatusDto,
} from './dto/complaints.dto';

const toAttachmentRef = (file: Express.Multer.File): AttachmentRef => ({
  path: file.path,
  originalName: file.originalname,
  mimeType: file.mimetype,
  size: file.size,
});

@Controller('complaints')
@UseGuards(JwtAuthGuard, RolesGuard)
export class ComplaintsController {
  constructor(
    private readonly complaintsService: ComplaintsService,
    private readonly reportsService: ComplaintReportsService,
  ) {}

  @Post()
  @Roles(UserRoleType.STUDENT)
  @UseInterceptors(FileInterceptor('attachment'))
  async create(
    @CurrentUser() actor: Actor,
    @Body() dto: CreateComplaintsDto,
    @UploadedFile() file?: Express.Multer.File,
  ) {
    try {
      return await this.complaintsService.create(
        actor,
        dto,
        file ? toAttachmentRef(file) : undefined,
      );
    } catch (err) {
      await this.discardUpload(file);
      throw err;
    }
  }

  @Get()
  findAll(@CurrentUser() actor: Actor, @Query() query: ListComplaintsQueryDto) {
    return this.complaintsService.findAll(actor, query);
  }

  @Get('stats')
  getStats(@CurrentUser() actor: Actor) {
    return this.reportsService.getStats(actor);
  }

  @Get('export')
  @Roles(UserRoleType.ADMIN)
  async export(@CurrentUser() actor: Actor, @Query() dto: ExportComplaintsDto) {
    const file = await this.reportsService.export(actor, dto);
    return new StreamableFile(file.body, {
      type: file.contentType,
      disposition: `attachment; filename="${file.filename}"`,
    });
  }

  @Get(':complaintNo')
  findOne(@CurrentUser() actor: Actor, @Param('complaintNo') complaintNo: string) {
    return this.complaintsService.findOne(actor, complaintNo);
  }

  @Get(':complaintNo/history')
  listHistory(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
  ) {
    return this.complaintsService.listHistory(actor, complaintNo);
  }

  @Get(':complaintNo/stats')
  getComplaintStats(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
  ) {
    return this.reportsService.getComplaintStats(actor, complaintNo);
  }

  @Patch(':complaintNo')
  @Roles(UserRoleType.STUDENT)
  updateDetails(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
    @Body() dto: UpdateComplaintDetailsDto,
  ) {
    return this.complaintsService.updateDetails(actor, complaintNo, dto);
  }

  @Patch(':complaintNo/assign')
  assign(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
    @Body() dto: AssignComplaintDto,
  ) {
    return this.complaintsService.assign(actor, complaintNo, dto);
  }

  @Patch(':complaintNo/status')
  updateStatus(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
    @Body() dto: UpdateComplaintStatusDto,
  ) {
    return this.complaintsService.updateStatus(actor, complaintNo, dto);
  }

  @Post(':complaintNo/reopen')
  @HttpCode(HttpStatus.OK)
  reopen(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
    @Body() dto: ReopenComplaintDto,
  ) {
    return this.complaintsService.reopen(actor, complaintNo, dto);
  }

  @Patch(':complaintNo/priority')
  updatePriority(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
    @Body() dto: UpdateComplaintPriorityDto,
  ) {
    return this.complaintsService.updatePriority(actor, complaintNo, dto);
  }

  @Post(':complaintNo/attachments')
  @UseInterceptors(FileInterceptor('attachment'))
  async addAttachment(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
    @UploadedFile() file?: Express.Multer.File,
  ) {
    if (!file) {
      throw new ValidationError('Invalid attachment', {
        attachment: ['A file is required'],
      });
    }
    try {
      return await this.complaintsService.addAttachment(
        actor,
        complaintNo,
        toAttachmentRef(file),
      );
    } catch (err) {
      await this.discardUpload(file);
      throw err;
    }
  }

  // multer has already written the file by the time the service rejects it
  private async discardUpload(file?: Express.Multer.File): Promise<void> {
    if (!file) return;
    await rm(file.path, { force: true });
  }
}
