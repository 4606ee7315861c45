import { Schema, model, type Types } from "mongoose";

const WikiDocumentSchema = new Schema(
  {
    slug: { type: String, required: true },
    locale: { type: String, required: true },
    title: { type: String, required: true },
    current_revision_id: { type: Number, default: null },
    current_revision_created_at: { type: Date, default: null },
    parent_id: {
      type: Schema.Types.ObjectId,
      ref: "WikiDocument",
      default: null,
      index: true,
    },
  },
  {
    collection: "wiki_documents",
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

WikiDocumentSchema.index({ locale: 1, slug: 1 }, { unique: true });

export interface WikiDocumentRecord {
  _id: Types.ObjectId;
  slug: string;
  locale: string;
  title: string;
  current_revision_id: number | null;
  current_revision_created_at: Date | null;
  parent_id: Types.ObjectId | null;
  created_at: Date;
  updated_at: Date;
}

export default model<WikiDocumentRecord>("WikiDocument", WikiDocumentSchema);
