import { Controller, Get, Param } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { AuditLogOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import { GetAuditLogsHandler, GetAuditLogsQuery } from '@application/use-cases';
import { unwrapResult } from '../result.mapper';

@ApiTags('Audit Logs')
@Controller('api/v1/audit-logs')
export class AuditLogsController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly getAuditLogs: GetAuditLogsHandler,
  ) {}

  @Get(':entityName/:entityId')
  @ApiOperation({ summary: 'Change history of an entity', description: 'Newest first.' })
  @ApiParam({ name: 'entityName', example: 'Booking' })
  @ApiParam({ name: 'entityId', description: 'Entity ID' })
  async history(
    @Param('entityName') entityName: string,
    @Param('entityId') entityId: string,
  ): Promise<AuditLogOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(new GetAuditLogsQuery(entityName, entityId), this.getAuditLogs),
    );
  }
}
