export enum ValidationType {
  REGISTER = 'register',
  RESET_PASSWORD = 'reset_password',
}

export type ValidationRequestResponse = {
  email: string;
  type: ValidationType;
  message: string;
};
