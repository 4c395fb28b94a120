import Joi from 'joi';
import { IEnvelope } from '../Types/MessageTypes.js';
import { ITrackerReply } from '../Types/ServerTypes.js';

const peerEntrySchema = Joi.object({
  peer_id: Joi.string().required(),
  ip: Joi.string().required(),
  port: Joi.number().integer().min(1).max(65535).required(),
});

const trackerReplySchema = Joi.object<ITrackerReply>({
  status: Joi.string().valid('success', 'error').required(),
  message: Joi.string().optional(),
  peer_count: Joi.number().integer().min(0).optional(),
  peers: Joi.array().items(peerEntrySchema).optional(),
});

const envelopeSchema = Joi.object<IEnvelope>({
  type: Joi.string().valid('direct', 'broadcast').required(),
  from: Joi.string().min(1).required(),
  content: Joi.string().allow('').required(),
});

export const validateTrackerReply = (data: unknown) => {
  return trackerReplySchema.validate(data, { convert: false, stripUnknown: { objects: true } });
};

export const validateEnvelope = (data: unknown) => {
  return envelopeSchema.validate(data, { convert: false, stripUnknown: { objects: true } });
};
