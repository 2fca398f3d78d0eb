import type { Address, EntityId } from '@leasehold/dto'
import { AuthorizationError, ConfigurationError } from '@leasehold/reasons'
import { sameAddress } from '../utils/address'
import type { PolicyHost } from './types'

/** Template-level settings: template owner only, and only until the template is frozen. */
export function assertTemplateEditor(host: PolicyHost, templateId: EntityId, caller: Address): void {
  if (!host.isTemplate(templateId)) {
    throw new ConfigurationError('CONFIG_TEMPLATE_INVALID', { context: { templateId: templateId.toString() } })
  }
  if (!sameAddress(host.ownerOf(templateId), caller)) throw new AuthorizationError('AUTH_NOT_OWNER')
  if (host.isTemplateFrozen(templateId)) {
    throw new ConfigurationError('CONFIG_TEMPLATE_FROZEN', { context: { templateId: templateId.toString() } })
  }
}

/** Instance-level settings: instance owner or active renter, after binding. Returns the bound template. */
export function assertInstanceConfigurer(host: PolicyHost, instanceId: EntityId, caller: Address): EntityId {
  const templateId = host.templateOf(instanceId)
  if (templateId === undefined) {
    throw new ConfigurationError('CONFIG_NOT_BOUND', { context: { instanceId: instanceId.toString() } })
  }
  if (!sameAddress(host.ownerOf(instanceId), caller) && !sameAddress(host.renterOf(instanceId), caller)) {
    throw new AuthorizationError('AUTH_NOT_RENTER')
  }
  return templateId
}
