import { Identifier } from '../shared/vos/Identifier';
import { uuidv4 } from '../utils/uuid';

export class RegistrationId extends Identifier {
  readonly kind = 'RegistrationId';

  private constructor(value: string) {
    super(value, 'registrationId');
  }

  static create(): RegistrationId {
    return new RegistrationId(uuidv4());
  }

  static from(value: string): RegistrationId {
    return new RegistrationId(value);
  }
}
