// Lives as long as the page does; a reload starts again from zero.
let visits = 0;

export const recordVisit = (): number => {
  visits += 1;
  return visits;
};

export const getVisitCount = (): number => visits;
