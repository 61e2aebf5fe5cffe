import { StatusCodes } from 'http-status-codes';

export class HttpError extends Error {
  readonly statusCode: StatusCodes;

  constructor(statusCode: StatusCodes, message: string) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}
