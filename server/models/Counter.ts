import { Schema, model } from "mongoose";

const CounterSchema = new Schema(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 },
  },
  { collection: "counters", versionKey: false },
);

export interface CounterRecord {
  _id: string;
  seq: number;
}

export default model<CounterRecord>("Counter", CounterSchema);
