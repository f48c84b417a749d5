import { Identifier } from '../shared/vos/Identifier';
import { uuidv4 } from '../utils/uuid';

export class UserId extends Identifier {
  readonly kind = 'UserId';

  private constructor(value: string) {
    super(value, 'userId');
  }

  static create(): UserId {
    return new UserId(uuidv4());
  }

  static from(value: string): UserId {
    return new UserId(value);
  }
}
