import { customAlphabet } from 'nanoid';

const hex8 = customAlphabet('0123456789abcdef', 8);

/** Short id users can type back ("confirm 3fa9c2d1") */
export function generateConfirmationId(): string {
  return hex8();
}
