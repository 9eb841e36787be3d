import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { FieldServiceNote } from '@fieldops/core/modules/field_service/data/entities'
import { SalesNote } from '@fieldops/core/modules/sales/data/entities'

export type MessageTargetKind = 'sales.order' | 'field_service.order'

export type MessageTarget = {
  kind: MessageTargetKind
  id: string
  tenantId: string
  organizationId: string
}

export interface MessagePoster {
  postMessage(target: MessageTarget, body: string): Promise<void>
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
}

export function formatRecordLink(kind: MessageTargetKind, id: string, label: string): string {
  return `<a href="#" data-model="${kind}" data-id="${escapeHtml(id)}">${escapeHtml(label)}</a>`
}

/**
 * Writes messages as activity notes. Both notes are system entries written
 * with elevated access, like the service order they reference.
 */
export function createNoteMessagePoster(repo: RecordRepository, authorUserId: string | null = null): MessagePoster {
  return {
    async postMessage(target, body) {
      const scope = { tenantId: target.tenantId, organizationId: target.organizationId }
      if (target.kind === 'sales.order') {
        await repo.create(
          SalesNote,
          { ...scope, contextType: 'order', contextId: target.id, authorUserId, body },
          { access: 'elevated' },
        )
        return
      }
      await repo.create(
        FieldServiceNote,
        { ...scope, orderId: target.id, authorUserId, body },
        { access: 'elevated' },
      )
    },
  }
}
