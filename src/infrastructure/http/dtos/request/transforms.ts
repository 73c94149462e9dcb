import { TransformFnParams } from 'class-transformer';

/** Query strings carry booleans as text; anything but "true"/"false" is left for the validator */
export const toBoolean = ({ value }: TransformFnParams): unknown => {
  if (value === 'true' || value === true) {
    return true;
  }
  if (value === 'false' || value === false) {
    return false;
  }
  return value;
};
