export interface ICounterRecord {
  _id: string;
  value: number;
}
