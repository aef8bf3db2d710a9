import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';

import { CurrentUser } from '../common/decorators/current-user.decorator';
import {
  ApiStandardResponse,
  ApiStandardResponseArray,
} from '../common/decorators/swagger-response.decorator';
import { MessageDto, type MessageResponse } from '../common/dto/message.dto';
import { PaginationDto } from '../common/dto/pagination.dto';
import type { Payment } from '../database/schema';
import { CreatePaymentDto, UpdatePaymentDto } from './dto/create-payment.dto';
import { PaymentListQueryDto } from './dto/payment-query.dto';
import { PaymentResponseDto } from './dto/payment-response.dto';
import { PaymentService } from './payment.service';

@ApiTags('payments')
@ApiBearerAuth()
@Controller('payments')
export class PaymentController {
  constructor(private readonly paymentService: PaymentService) {}

  @Post()
  @ApiStandardResponse(PaymentResponseDto)
  create(
    @CurrentUser('id') userId: number,
    @Body() createPaymentDto: CreatePaymentDto,
  ): Promise<Payment> {
    return this.paymentService.create(userId, createPaymentDto);
  }

  @Get()
  @ApiStandardResponseArray(PaymentResponseDto)
  findAll(
    @CurrentUser('id') userId: number,
    @Query() query: PaymentListQueryDto,
  ): Promise<Payment[]> {
    return this.paymentService.findAll(userId, query);
  }

  @Get('pupil/:pupilId')
  @ApiStandardResponseArray(PaymentResponseDto)
  findByPupil(
    @Param('pupilId', ParseIntPipe) pupilId: number,
    @CurrentUser('id') userId: number,
    @Query() query: PaginationDto,
  ): Promise<Payment[]> {
    return this.paymentService.findByPupil(pupilId, userId, query.skip, query.limit);
  }

  @Get('pupil/:pupilId/month/:year/:month')
  @ApiStandardResponseArray(PaymentResponseDto)
  findByPupilAndMonth(
    @Param('pupilId', ParseIntPipe) pupilId: number,
    @Param('year', ParseIntPipe) year: number,
    @Param('month', ParseIntPipe) month: number,
    @CurrentUser('id') userId: number,
  ): Promise<Payment[]> {
    return this.paymentService.findByPupilAndMonth(pupilId, userId, year, month);
  }

  @Get(':id')
  @ApiStandardResponse(PaymentResponseDto)
  findOne(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<Payment> {
    return this.paymentService.findOne(id, userId);
  }

  @Put(':id')
  @ApiStandardResponse(PaymentResponseDto)
  update(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() updatePaymentDto: UpdatePaymentDto,
  ): Promise<Payment> {
    return this.paymentService.update(id, userId, updatePaymentDto);
  }

  @Delete(':id')
  @ApiStandardResponse(MessageDto)
  remove(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<MessageResponse> {
    return this.paymentService.remove(id, userId);
  }
}
