// Four-stratum population written by `stratalloc init`
export const EXAMPLE_SURVEY = {
  version: '1.0.0',
  precision: {
    margin_of_error: 1.5,
    confidence_z: 1.96,
  },
  allocation: {
    methods: ['proportional', 'neyman', 'cost-optimum'],
    rounding: 'independent',
  },
  strata: [
    { id: '1', population_size: 4000, std_dev: 10, unit_cost: 4, unit_time: 1 },
    { id: '2', population_size: 3000, std_dev: 20, unit_cost: 6, unit_time: 1.5 },
    { id: '3', population_size: 2000, std_dev: 30, unit_cost: 8, unit_time: 2 },
    { id: '4', population_size: 1000, std_dev: 40, unit_cost: 10, unit_time: 2.5 },
  ],
};
