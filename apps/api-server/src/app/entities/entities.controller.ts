import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { CompanyHistory } from '@riskline/shared-models';
import { EntityStoreService } from '../persistence/entity-store.service';

@Controller('entities')
export class EntitiesController {
  constructor(private readonly entityStore: EntityStoreService) {}

  /**
   * GET /api/entities/:symbol
   *
   * A company with its predictions and ratio snapshots, newest first.
   */
  @Get(':symbol')
  getHistory(@Param('symbol') symbol: string): CompanyHistory {
    const history = this.entityStore.getHistory(symbol.trim());
    if (!history) {
      throw new NotFoundException(`Company "${symbol}" not found`);
    }
    return history;
  }
}
