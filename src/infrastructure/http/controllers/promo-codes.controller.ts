import { Body, Controller, Get, Param, Post, Put, Query } from '@nestjs/common';
import { ApiConflictResponse, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { PromoCodeOutputDto, PromoCodeValidationOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  CreatePromoCodeCommand,
  CreatePromoCodeHandler,
  GetPromoCodesHandler,
  GetPromoCodesQuery,
  UpdatePromoCodeCommand,
  UpdatePromoCodeHandler,
  ValidatePromoCodeHandler,
  ValidatePromoCodeQuery,
} from '@application/use-cases';
import {
  ActiveOnlyQueryDto,
  CreatePromoCodeRequestDto,
  UpdatePromoCodeRequestDto,
  ValidatePromoCodeQueryDto,
} from '../dtos/request';
import { unwrapResult } from '../result.mapper';

@ApiTags('Promo Codes')
@Controller('api/v1/promo-codes')
export class PromoCodesController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly createPromoCode: CreatePromoCodeHandler,
    private readonly updatePromoCode: UpdatePromoCodeHandler,
    private readonly validatePromoCode: ValidatePromoCodeHandler,
    private readonly getPromoCodes: GetPromoCodesHandler,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List promo codes' })
  async list(@Query() query: ActiveOnlyQueryDto): Promise<PromoCodeOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(new GetPromoCodesQuery(query.activeOnly ?? false), this.getPromoCodes),
    );
  }

  @Get(':code/validate')
  @ApiOperation({
    summary: 'Check a code against a course and amount',
    description: 'Returns the discount and final amount when the code applies.',
  })
  @ApiParam({ name: 'code', example: 'WELCOME10' })
  async validate(
    @Param('code') code: string,
    @Query() query: ValidatePromoCodeQueryDto,
  ): Promise<PromoCodeValidationOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new ValidatePromoCodeQuery(code, query.courseId, query.amount, query.currency),
        this.validatePromoCode,
      ),
    );
  }

  @Post()
  @ApiOperation({ summary: 'Create promo code' })
  @ApiConflictResponse({ description: 'Code already exists' })
  async create(@Body() body: CreatePromoCodeRequestDto): Promise<PromoCodeOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CreatePromoCodeCommand(body), this.createPromoCode),
    );
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update promo code' })
  @ApiParam({ name: 'id', description: 'Promo code ID' })
  async update(
    @Param('id') id: string,
    @Body() body: UpdatePromoCodeRequestDto,
  ): Promise<PromoCodeOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new UpdatePromoCodeCommand({ ...body, promoCodeId: id }),
        this.updatePromoCode,
      ),
    );
  }
}
