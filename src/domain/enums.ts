export enum BusinessLine {
  Life = 'Life',
  NonLife = 'NonLife',
}

export enum ParameterGroup {
  Baseline = 'Baseline',
  Economic = 'Economic',
  LossExpense = 'LossExpense',
  ChurnNewBusiness = 'ChurnNewBusiness',
  Scenario = 'Scenario',
  RegulatoryTech = 'RegulatoryTech',
}
