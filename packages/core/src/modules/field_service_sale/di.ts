import { asFunction } from 'awilix'
import type { CommandAuth } from '@fieldops/shared/lib/commands'
import type { AppContainer } from '@fieldops/shared/lib/di/container'
import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { createFallbackTranslator, type TranslateWithFallbackFn } from '@fieldops/shared/lib/i18n/translate'
import type { SalesOrderCustomerChange } from '@fieldops/core/modules/sales/lib/customerChange'
import type { SalesOrderConfirmation } from '@fieldops/core/modules/sales/lib/orderLifecycle'
import { loadFieldServiceSaleSettings, type FieldServiceSaleSettings } from './lib/config'
import { createFieldServiceConfirmation, createFieldServiceCustomerChange } from './lib/confirmation'
import { FieldServiceSaleService } from './lib/fieldServiceSaleService'
import { DefaultFieldServiceLineGenerator, type FieldServiceLineGenerator } from './lib/lineGenerator'
import { createNoteMessagePoster, type MessagePoster } from './lib/messages'

/** Must run after the sales registrar: replaces its confirmation and customer-change steps. */
export function register(container: AppContainer) {
  container.register({
    fieldServiceSaleSettings: asFunction(() => loadFieldServiceSaleSettings()).singleton(),
    fieldServiceSaleTranslate: asFunction(() => createFallbackTranslator()).singleton(),
    fieldServiceMessagePoster: asFunction((recordRepository: RecordRepository, auth: CommandAuth | null) =>
      createNoteMessagePoster(recordRepository, auth?.sub ?? null),
    ).scoped(),
    fieldServiceSaleService: asFunction(
      (
        recordRepository: RecordRepository,
        fieldServiceMessagePoster: MessagePoster,
        fieldServiceSaleSettings: FieldServiceSaleSettings,
        fieldServiceSaleTranslate: TranslateWithFallbackFn,
      ) =>
        new FieldServiceSaleService(
          recordRepository,
          fieldServiceMessagePoster,
          fieldServiceSaleSettings,
          fieldServiceSaleTranslate,
        ),
    ).scoped(),
    fieldServiceLineGenerator: asFunction(
      (
        recordRepository: RecordRepository,
        fieldServiceSaleService: FieldServiceSaleService,
        fieldServiceSaleSettings: FieldServiceSaleSettings,
      ) => new DefaultFieldServiceLineGenerator(recordRepository, fieldServiceSaleService, fieldServiceSaleSettings),
    ).scoped(),
    salesOrderConfirmation: asFunction(
      (
        baseSalesOrderConfirmation: SalesOrderConfirmation,
        recordRepository: RecordRepository,
        fieldServiceLineGenerator: FieldServiceLineGenerator,
      ) =>
        createFieldServiceConfirmation(baseSalesOrderConfirmation, {
          repo: recordRepository,
          lineGenerator: fieldServiceLineGenerator,
        }),
    ).scoped(),
    salesOrderCustomerChange: asFunction(
      (baseSalesOrderCustomerChange: SalesOrderCustomerChange, fieldServiceSaleService: FieldServiceSaleService) =>
        createFieldServiceCustomerChange(baseSalesOrderCustomerChange, fieldServiceSaleService),
    ).scoped(),
  })
}
