export type NelderMeadOptions = {
  maxIterations?: number;
  tolerance?: number;
  initialStep?: number;
};

export type NelderMeadResult = {
  x: number[];
  value: number;
  iterations: number;
  converged: boolean;
};

type Vertex = { x: number[]; value: number };

function combine(a: number[], b: number[], weight: number): number[] {
  return a.map((value, i) => value + weight * (b[i] - value));
}

export function minimizeNelderMead(
  objective: (x: number[]) => number,
  start: number[],
  options: NelderMeadOptions = {}
): NelderMeadResult {
  const maxIterations = options.maxIterations ?? 200;
  const tolerance = options.tolerance ?? 1e-8;
  const step = options.initialStep ?? 0.1;
  const evaluate = (x: number[]): Vertex => {
    const value = objective(x);
    return { x, value: Number.isFinite(value) ? value : Number.POSITIVE_INFINITY };
  };

  const simplex: Vertex[] = [evaluate([...start])];
  for (let i = 0; i < start.length; i += 1) {
    const point = [...start];
    point[i] = point[i] === 0 ? step : point[i] * (1 + step);
    simplex.push(evaluate(point));
  }

  let iterations = 0;
  let converged = false;
  while (iterations < maxIterations) {
    simplex.sort((a, b) => a.value - b.value);
    const best = simplex[0];
    const worst = simplex[simplex.length - 1];
    if (Math.abs(worst.value - best.value) <= tolerance * (Math.abs(best.value) + tolerance)) {
      converged = true;
      break;
    }
    iterations += 1;

    const centroid = new Array<number>(start.length).fill(0);
    for (let i = 0; i < simplex.length - 1; i += 1) {
      simplex[i].x.forEach((value, j) => {
        centroid[j] += value / (simplex.length - 1);
      });
    }

    const reflected = evaluate(combine(centroid, worst.x, -1));
    const secondWorst = simplex[simplex.length - 2];
    if (reflected.value < best.value) {
      const expanded = evaluate(combine(centroid, worst.x, -2));
      simplex[simplex.length - 1] = expanded.value < reflected.value ? expanded : reflected;
      continue;
    }
    if (reflected.value < secondWorst.value) {
      simplex[simplex.length - 1] = reflected;
      continue;
    }

    const contracted =
      reflected.value < worst.value
        ? evaluate(combine(centroid, reflected.x, 0.5))
        : evaluate(combine(centroid, worst.x, 0.5));
    if (contracted.value < Math.min(worst.value, reflected.value)) {
      simplex[simplex.length - 1] = contracted;
      continue;
    }

    for (let i = 1; i < simplex.length; i += 1) {
      simplex[i] = evaluate(combine(best.x, simplex[i].x, 0.5));
    }
  }

  simplex.sort((a, b) => a.value - b.value);
  return { x: simplex[0].x, value: simplex[0].value, iterations, converged };
}
