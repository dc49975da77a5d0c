import { Body, Controller, Get, Param, Post, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { UserRoleType } from '../common/enums/user-role.enum';
import { RolesGuard } from '../common/guards/roles.guard';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { CreateFeedbackDto } from './dto/feedback.dto';
import { FeedbackService } from './feedback.service';

@Controller()
@UseGuards(JwtAuthGuard, RolesGuard)
export class FeedbackController {
  constructor(private readonly feedbackService: FeedbackService) {}

  @Get('feedback')
  findAll(@CurrentUser() actor: Actor) {
    return this.feedbackService.findAll(actor);
  }

  @Get('complaints/:complaintNo/feedback')
  findForComplaint(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
  ) {
    return this.feedbackService.findForComplaint(actor, complaintNo);
  }

  @Post('complaints/:complaintNo/feedback')
  @Roles(UserRoleType.STUDENT)
  addFeedback(
    @CurrentUser() actor: Actor,
    @Param('complaintNo') complaintNo: string,
    @Body() dto: CreateFeedbackDto,
  ) {
    return this.feedbackService.addFeedback(actor, complaintNo, dto);
  }
}
