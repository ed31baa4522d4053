export type validationErrorType = {
  field: string;
  message: string;
};
