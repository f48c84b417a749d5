import { Identifier } from '../shared/vos/Identifier';
import { uuidv4 } from '../utils/uuid';

export class StaffInvitationId extends Identifier {
  readonly kind = 'StaffInvitationId';

  private constructor(value: string) {
    super(value, 'staffInvitationId');
  }

  static create(): StaffInvitationId {
    return new StaffInvitationId(uuidv4());
  }

  static from(value: string): StaffInvitationId {
    return new StaffInvitationId(value);
  }
}
