import Joi from 'joi';

export interface IRegisterArgs {
  peerId: string;
  ip: string;
  port: number;
}

const registerSchema = Joi.object<IRegisterArgs>({
  peerId: Joi.string().min(1).max(256).required(),
  ip: Joi.alternatives()
    .try(Joi.string().ip(), Joi.string().hostname())
    .required(),
  port: Joi.number().integer().min(1).max(65535).required(),
});

/**
 * Validates the REGISTER arguments.
 * Tokens arrive as strings; joi converts the port to a number.
 */
export const validateRegisterArgs = (data: { peerId: string; ip: string; port: string }) => {
  return registerSchema.validate(data);
};
