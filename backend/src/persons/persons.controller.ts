// ============================================================
// Clickgraph — Persons Controller
// Route: POST /person
//
// Protected by SharedSecretGuard (X-Api-Key).
// ============================================================

import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { PersonsService } from './persons.service';
import { UpsertPersonDto } from './dto/upsert-person.dto';
import { SharedSecretGuard } from '../auth/guards/shared-secret.guard';

@Controller('person')
@UseGuards(SharedSecretGuard)
export class PersonsController {
  constructor(private readonly personsService: PersonsService) {}

  /**
   * POST /person
   *
   *   Request:  { id?, name?, email?, contact_number? }
   *   Response: { id, name, email, contact_number }
   *
   * Same id twice → one node, fields from the latest call.
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async upsert(@Body() dto: UpsertPersonDto) {
    return this.personsService.upsert(dto);
  }
}
