import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty, MaxLength } from 'class-validator';
import { Result, success } from '../../common/result';
import { AuditLogOutputDto, toAuditLogOutput } from '../../dtos';
import { RequestHandler, ResultQuery } from '../../pipeline';
import { IAuditLogRepositoryPort } from '../../ports';

export class GetAuditLogsQuery extends ResultQuery<AuditLogOutputDto[]> {
  @IsNotEmpty({ message: 'Entity name is required.' })
  @MaxLength(100)
  readonly entityName: string;

  @IsNotEmpty({ message: 'Entity ID is required.' })
  readonly entityId: string;

  constructor(entityName: string, entityId: string) {
    super();
    this.entityName = entityName;
    this.entityId = entityId;
  }
}

@Injectable()
export class GetAuditLogsHandler
  implements RequestHandler<GetAuditLogsQuery, Result<AuditLogOutputDto[]>>
{
  constructor(
    @Inject('IAuditLogRepository')
    private readonly auditLogRepository: IAuditLogRepositoryPort,
  ) {}

  async handle(query: GetAuditLogsQuery): Promise<Result<AuditLogOutputDto[]>> {
    const entries = await this.auditLogRepository.findByEntity(query.entityName, query.entityId);
    return success(entries.map(toAuditLogOutput));
  }
}
