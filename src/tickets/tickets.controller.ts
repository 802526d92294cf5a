import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import {
  CurrentIdentity,
  RequireScope,
  ResourceScoped,
} from '../auth/decorators';
import { Identity } from '../auth/identity/identity';
import { ParseIdPipe } from '../utils/pipes/parse-id.pipe';
import { TicketsDomainService } from './domain/services/tickets.domain.service';
import { CreateTicketDto } from './dto/create-ticket.dto';
import { UpdateTicketDto } from './dto/update-ticket.dto';
import { ChangePriorityDto } from './dto/change-priority.dto';
import { MoveTicketDto } from './dto/move-ticket.dto';
import { TicketResponseDto } from './dto/ticket-response.dto';

/**
 * Tickets Controller
 *
 * Every route declares its capability and the queue-group permission the
 * gateway checks against the addressed ticket or queue. A ticket the caller
 * may not see answers 404.
 */
@ApiTags('Tickets')
@Controller({ path: 'tickets', version: '1' })
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Missing or invalid credential' })
@ApiForbiddenResponse({ description: 'Missing scope or permission' })
export class TicketsController {
  constructor(private readonly ticketsService: TicketsDomainService) {}

  @Get(':id')
  @RequireScope('tickets:read')
  @ResourceScoped('ticket', 'read')
  @ApiOperation({ summary: 'Get a ticket' })
  @ApiOkResponse({ type: TicketResponseDto })
  @ApiNotFoundResponse({ description: 'No such ticket for this caller' })
  async findOne(
    @Param('id', ParseIdPipe) id: number,
  ): Promise<TicketResponseDto> {
    return new TicketResponseDto(await this.ticketsService.findById(id));
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @RequireScope('tickets:write')
  @ResourceScoped('queue', 'create')
  @ApiOperation({ summary: 'Open a ticket in a queue' })
  @ApiCreatedResponse({ type: TicketResponseDto })
  async create(
    @CurrentIdentity() identity: Identity,
    @Body() dto: CreateTicketDto,
  ): Promise<TicketResponseDto> {
    const ticket = await this.ticketsService.open({
      title: dto.title,
      queueId: dto.queueId,
      priorityId: dto.priorityId,
      // Customers open tickets for themselves
      customerCompanyId:
        identity.kind === 'customer' ? identity.customerCompanyId : undefined,
      customerLogin:
        identity.kind === 'customer' ? identity.customerLogin : undefined,
    });
    return new TicketResponseDto(ticket);
  }

  @Patch(':id')
  @RequireScope('tickets:write')
  @ResourceScoped('ticket', 'update')
  @ApiOperation({ summary: 'Update a ticket' })
  @ApiOkResponse({ type: TicketResponseDto })
  @ApiNotFoundResponse({ description: 'No such ticket for this caller' })
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateTicketDto,
  ): Promise<TicketResponseDto> {
    return new TicketResponseDto(
      await this.ticketsService.rename(id, dto.title),
    );
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @RequireScope('tickets:delete')
  @ResourceScoped('ticket', 'delete')
  @ApiOperation({ summary: 'Delete (archive) a ticket' })
  @ApiNoContentResponse({ description: 'Ticket archived' })
  @ApiNotFoundResponse({ description: 'No such ticket for this caller' })
  async remove(@Param('id', ParseIdPipe) id: number): Promise<void> {
    await this.ticketsService.archive(id);
  }

  @Patch(':id/priority')
  @RequireScope('tickets:write')
  @ResourceScoped('ticket', 'priority')
  @ApiOperation({ summary: 'Change ticket priority' })
  @ApiOkResponse({ type: TicketResponseDto })
  async changePriority(
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: ChangePriorityDto,
  ): Promise<TicketResponseDto> {
    return new TicketResponseDto(
      await this.ticketsService.changePriority(id, dto.priorityId),
    );
  }

  @Post(':id/move')
  @HttpCode(HttpStatus.OK)
  @RequireScope('tickets:write')
  @ResourceScoped('queue', 'move_into')
  @ApiOperation({ summary: 'Move a ticket to another queue' })
  @ApiOkResponse({ type: TicketResponseDto })
  async move(
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: MoveTicketDto,
  ): Promise<TicketResponseDto> {
    return new TicketResponseDto(
      await this.ticketsService.moveToQueue(id, dto.queueId),
    );
  }
}
