import { Schema, model, type Types } from "mongoose";

const RevisionSchema = new Schema(
  {
    revision_id: { type: Number, required: true, unique: true },
    document_id: {
      type: Schema.Types.ObjectId,
      ref: "WikiDocument",
      required: true,
      index: true,
    },
    title: { type: String, required: true },
    content: { type: String, default: "" },
    summary: { type: String, default: "" },
    comment: { type: String, default: "" },
    creator: { type: String, default: null },
    is_approved: { type: Boolean, default: false, index: true },
    based_on_id: { type: Number, default: null },
    created_at: { type: Date, required: true },
  },
  { collection: "wiki_revisions" },
);

RevisionSchema.index({ document_id: 1, created_at: 1, revision_id: 1 });

export interface RevisionRecord {
  _id: Types.ObjectId;
  revision_id: number;
  document_id: Types.ObjectId;
  title: string;
  content: string;
  summary: string;
  comment: string;
  creator: string | null;
  is_approved: boolean;
  based_on_id: number | null;
  created_at: Date;
}

export default model<RevisionRecord>("Revision", RevisionSchema);
