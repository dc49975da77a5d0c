import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { stringify } from 'csv-stringify/sync';
import PDFDocument from 'pdfkit';
import { In, Repository } from 'typeorm';
import {
  COMPLAINT_PRIORITY_LABELS,
  COMPLAINT_STATUS_LABELS,
  ComplaintPriority,
  ComplaintStatus,
} from '../common/enums/complaint.enum';
import { ApiResponse } from '../common/interfaces/api-response.interface';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { handleUnknown } from '../common/utils/handle-unknown.util';
import { ComplaintHistoryService } from './complaint-history.service';
import { applyActorScope } from './complaint-scope';
import {
  ComplaintDetails,
  HistoryEntry,
  toComplaintDetails,
  toHistoryEntry,
} from './complaints.mapper';
import { ComplaintsService } from './complaints.service';
import { ExportComplaintsDto, ExportFormat } from './dto/complaints.dto';
import { ComplaintHistory } from './entity/complaint-history.entity';
import { Complaint } from './entity/complaints.entity';
import { authorize, ComplaintAction } from './policy/complaint-policy';

export interface ComplaintStats {
  total: number;
  by_status: Record<ComplaintStatus, number>;
  by_priority: Record<ComplaintPriority, number>;
  high_priority: number;
  avg_resolution_hours: number | null;
  by_category: { category: string; count: number }[];
  by_month: { month: string; count: number }[];
}

export interface SingleComplaintStats {
  complaint_no: string;
  status: ComplaintStatus;
  history_count: number;
  days_since_created: number;
  days_since_resolved: number | null;
}

export interface ExportFile {
  filename: string;
  contentType: string;
  body: Buffer;
}

export const EXPORT_CSV_COLUMNS = [
  'Complaint No',
  'Title',
  'Status',
  'Priority',
  'User',
  'Assigned To',
  'Category',
  'Created At',
  'Resolved At',
];

export const PDF_ROW_LIMIT = 100;
const MONTH_WINDOW = 12;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  json: 'application/json',
  pdf: 'application/pdf',
};

const pad = (value: number) => String(value).padStart(2, '0');

/** `YYYY-MM-DD HH:MM` in UTC, the format used by every export. */
export function formatExportDate(value: Date | null): string {
  if (!value) return '';
  const d = new Date(value);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`;
}

function monthKey(value: Date): string {
  return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}`;
}

// a bare date is inclusive of the whole day
function exportRange(dto: ExportComplaintsDto): { from?: Date; before?: Date } {
  const range: { from?: Date; before?: Date } = {};
  if (dto.from_date) range.from = new Date(dto.from_date);
  if (dto.to_date) {
    const to = new Date(dto.to_date);
    range.before = /^\d{4}-\d{2}-\d{2}$/.test(dto.to_date)
      ? new Date(to.getTime() + DAY_MS)
      : new Date(to.getTime() + 1);
  }
  return range;
}

@Injectable()
export class ComplaintReportsService {
  private readonly logger = new Logger(ComplaintReportsService.name);

  constructor(
    @InjectRepository(Complaint)
    private readonly complaintsRepo: Repository<Complaint>,
    @InjectRepository(ComplaintHistory)
    private readonly historyRepo: Repository<ComplaintHistory>,
    private readonly complaintsService: ComplaintsService,
    private readonly history: ComplaintHistoryService,
  ) {}

  async getStats(
    actor: Actor,
    now: Date = new Date(),
  ): Promise<ApiResponse<ComplaintStats>> {
    try {
      const complaints = await applyActorScope(
        this.complaintsRepo
          .createQueryBuilder('c')
          .leftJoin('c.category', 'category')
          .select([
            'c.id',
            'c.status',
            'c.priority',
            'c.created_at',
            'c.resolved_at',
            'category.id',
            'category.name',
          ]),
        actor,
      ).getMany();

      const byStatus: Record<ComplaintStatus, number> = {
        [ComplaintStatus.PENDING]: 0,
        [ComplaintStatus.IN_PROGRESS]: 0,
        [ComplaintStatus.RESOLVED]: 0,
        [ComplaintStatus.CLOSED]: 0,
      };
      const byPriority: Record<ComplaintPriority, number> = {
        [ComplaintPriority.LOW]: 0,
        [ComplaintPriority.MEDIUM]: 0,
        [ComplaintPriority.HIGH]: 0,
      };
      const byCategory = new Map<string, number>();

      const months = new Map<string, number>();
      for (let i = MONTH_WINDOW - 1; i >= 0; i -= 1) {
        const month = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - i, 1));
        months.set(monthKey(month), 0);
      }

      let resolvedCount = 0;
      let resolutionMs = 0;
      for (const complaint of complaints) {
        byStatus[complaint.status] += 1;
        byPriority[complaint.priority] += 1;

        const category = complaint.category ? complaint.category.name : 'Uncategorized';
        byCategory.set(category, (byCategory.get(category) ?? 0) + 1);

        const created = new Date(complaint.created_at);
        const month = monthKey(created);
        const inWindow = months.get(month);
        if (inWindow !== undefined) months.set(month, inWindow + 1);

        if (complaint.resolved_at) {
          resolvedCount += 1;
          resolutionMs += new Date(complaint.resolved_at).getTime() - created.getTime();
        }
      }

      return {
        success: true,
        message: 'Complaint statistics fetched successfully.',
        data: {
          total: complaints.length,
          by_status: byStatus,
          by_priority: byPriority,
          high_priority: byPriority[ComplaintPriority.HIGH],
          avg_resolution_hours:
            resolvedCount === 0
              ? null
              : Math.round((resolutionMs / resolvedCount / HOUR_MS) * 100) / 100,
          by_category: [...byCategory.entries()]
            .map(([name, count]) => ({ category: name, count }))
            .sort((a, b) => b.count - a.count || a.category.localeCompare(b.category)),
          by_month: [...months.entries()].map(([month, count]) => ({ month, count })),
        },
      };
    } catch (err) {
      handleUnknown(err, 'Failed to compute complaint statistics.');
    }
  }

  async getComplaintStats(
    actor: Actor,
    complaintNo: string,
    now: Date = new Date(),
  ): Promise<ApiResponse<SingleComplaintStats>> {
    const complaint = await this.complaintsService.findVisible(actor, complaintNo);
    const daysSince = (value: Date) =>
      Math.floor((now.getTime() - new Date(value).getTime()) / DAY_MS);

    return {
      success: true,
      message: `Statistics for complaint ${complaintNo} fetched successfully.`,
      data: {
        complaint_no: complaint.complaint_no,
        status: complaint.status,
        history_count: await this.history.countFor(complaint.id),
        days_since_created: daysSince(complaint.created_at),
        days_since_resolved: complaint.resolved_at
          ? daysSince(complaint.resolved_at)
          : null,
      },
    };
  }

  async export(
    actor: Actor,
    dto: ExportComplaintsDto,
    now: Date = new Date(),
  ): Promise<ExportFile> {
    authorize(actor, ComplaintAction.EXPORT);
    const format: ExportFormat = dto.format ?? 'csv';

    try {
      const complaints = await this.exportRows(dto, format === 'pdf' ? PDF_ROW_LIMIT : undefined);
      const stamp = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;

      let body: Buffer;
      if (format === 'csv') body = Buffer.from(this.toCsv(complaints), 'utf8');
      else if (format === 'json') {
        body = Buffer.from(
          JSON.stringify(await this.toJsonDocument(complaints, dto, now), null, 2),
          'utf8',
        );
      } else body = await this.toPdf(complaints, now);

      this.logger.log(
        `User ${actor.id} exported ${complaints.length} complaints as ${format}`,
      );
      return {
        filename: `complaints_export_${stamp}.${format}`,
        contentType: CONTENT_TYPES[format],
        body,
      };
    } catch (err) {
      handleUnknown(err, 'Failed to export complaints.');
    }
  }

  toCsv(complaints: Complaint[]): string {
    return stringify(
      complaints.map((complaint) => [
        complaint.complaint_no,
        complaint.title,
        COMPLAINT_STATUS_LABELS[complaint.status],
        COMPLAINT_PRIORITY_LABELS[complaint.priority],
        complaint.creator ? complaint.creator.name : '',
        complaint.assignee ? complaint.assignee.name : '',
        complaint.category ? complaint.category.name : '',
        formatExportDate(complaint.created_at),
        formatExportDate(complaint.resolved_at),
      ]),
      { header: true, columns: EXPORT_CSV_COLUMNS },
    );
  }

  private exportRows(dto: ExportComplaintsDto, limit?: number): Promise<Complaint[]> {
    const qb = this.complaintsRepo
      .createQueryBuilder('c')
      .leftJoinAndSelect('c.category', 'category')
      .leftJoinAndSelect('c.subcategory', 'subcategory')
      .leftJoinAndSelect('c.creator', 'creator')
      .leftJoinAndSelect('c.assignee', 'assignee');

    const { from, before } = exportRange(dto);
    if (from) qb.andWhere('c.created_at >= :from', { from });
    if (before) qb.andWhere('c.created_at < :before', { before });
    if (dto.status) qb.andWhere('c.status = :status', { status: dto.status });
    if (dto.category !== undefined) {
      qb.andWhere('c.category_id = :category', { category: dto.category });
    }

    qb.orderBy('c.created_at', 'DESC').addOrderBy('c.id', 'DESC');
    if (limit !== undefined) qb.limit(limit);
    return qb.getMany();
  }

  private async toJsonDocument(
    complaints: Complaint[],
    dto: ExportComplaintsDto,
    now: Date,
  ): Promise<{
    exported_at: string;
    count: number;
    complaints: (ComplaintDetails & { history?: HistoryEntry[] })[];
  }> {
    const histories = new Map<number, HistoryEntry[]>();
    if (dto.include_history && complaints.length > 0) {
      const entries = await this.historyRepo.find({
        where: { complaint_id: In(complaints.map((c) => c.id)) },
        relations: ['changed_by'],
        order: { id: 'ASC' },
      });
      for (const entry of entries) {
        const list = histories.get(entry.complaint_id) ?? [];
        list.push(toHistoryEntry(entry));
        histories.set(entry.complaint_id, list);
      }
    }

    return {
      exported_at: now.toISOString(),
      count: complaints.length,
      complaints: complaints.map((complaint) =>
        dto.include_history
          ? { ...toComplaintDetails(complaint), history: histories.get(complaint.id) ?? [] }
          : toComplaintDetails(complaint),
      ),
    };
  }

  private toPdf(complaints: Complaint[], now: Date): Promise<Buffer> {
    const doc = new PDFDocument({ size: 'A4', margin: 40 });
    const chunks: Buffer[] = [];
    const done = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    doc.fontSize(16).text('Complaints Report', { align: 'center' });
    doc
      .fontSize(9)
      .fillColor('#555555')
      .text(`Generated ${formatExportDate(now)} UTC, ${complaints.length} complaints`, {
        align: 'center',
      });
    doc.moveDown();

    for (const complaint of complaints) {
      doc
        .fillColor('#000000')
        .fontSize(10)
        .text(`${complaint.complaint_no}  ${complaint.title}`);
      doc
        .fontSize(8)
        .fillColor('#333333')
        .text(
          [
            COMPLAINT_STATUS_LABELS[complaint.status],
            COMPLAINT_PRIORITY_LABELS[complaint.priority],
            complaint.category ? complaint.category.name : '',
            complaint.creator ? complaint.creator.name : '',
            complaint.assignee ? `assigned to ${complaint.assignee.name}` : 'unassigned',
            formatExportDate(complaint.created_at),
          ]
            .filter(Boolean)
            .join(' | '),
        );
      doc.moveDown(0.5);
    }

    doc.end();
    return done;
  }
}
