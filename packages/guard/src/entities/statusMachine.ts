import { EntityStatus } from '@leasehold/dto'

export class EntityStatusMachine {
  private ALLOWED: Record<EntityStatus, EntityStatus[]> = {
    [EntityStatus.ACTIVE]:     [EntityStatus.PAUSED, EntityStatus.TERMINATED],
    [EntityStatus.PAUSED]:     [EntityStatus.ACTIVE, EntityStatus.TERMINATED],
    [EntityStatus.TERMINATED]: []
  }

  can(from: EntityStatus, to: EntityStatus) {
    return this.ALLOWED[from].includes(to)
  }
}
