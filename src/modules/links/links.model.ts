/**
 * Link MongoDB Model
 * Mongoose schema for scored links
 */

import mongoose, { Schema } from 'mongoose';
import { LinkClassification } from '../../lib/crawling';

export interface ILinkRecord {
  url: string;
  domain: string;
  path?: string;
  query?: string;
  sourceUrl: string;
  depth: number;
  anchorText: string;
  surroundingText?: string;
  ruleScore: number;
  llmScore?: number;
  llmReason?: string;
  finalScore: number;
  matchedKeywords: string[];
  classification: LinkClassification;
  jobId?: string;
  storedAt: Date;
}

const LinkSchema = new Schema<ILinkRecord>(
  {
    url: {
      type: String,
      required: true,
      unique: true,
    },
    domain: {
      type: String,
      required: true,
      index: true,
    },
    path: {
      type: String,
      default: '',
    },
    query: {
      type: String,
      default: '',
    },
    sourceUrl: {
      type: String,
      required: true,
      index: true,
    },
    depth: {
      type: Number,
      required: true,
      min: 0,
    },
    anchorText: {
      type: String,
      default: '',
    },
    surroundingText: {
      type: String,
      default: '',
    },
    ruleScore: {
      type: Number,
      required: true,
      min: 0,
      max: 1,
    },
    llmScore: {
      type: Number,
      min: 0,
      max: 1,
    },
    llmReason: String,
    finalScore: {
      type: Number,
      required: true,
      min: 0,
      max: 1,
      index: true,
    },
    matchedKeywords: {
      type: [String],
      default: [],
    },
    classification: {
      type: String,
      enum: Object.values(LinkClassification),
      required: true,
    },
    jobId: {
      type: String,
      index: true,
    },
    storedAt: {
      type: Date,
      default: Date.now,
    },
  },
  {
    collection: 'links',
  }
);

LinkSchema.index({ finalScore: -1, url: 1 });

export const LinkModel = mongoose.model<ILinkRecord>('Link', LinkSchema);
