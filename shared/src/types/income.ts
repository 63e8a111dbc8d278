export interface Income {
  id: number;
  date: string;
  source: string;
  amount: number;
  note: string;
}

export interface IncomeInput {
  date: string;
  source: string;
  amount: number;
  note?: string;
}
