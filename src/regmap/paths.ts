import type {BoundElement} from "./elements";
import {TypeMismatchError} from "./errors";

type PathStep = {name: string}|{index: number};

const STEP_RE = /(?:\.?(\w+))|(?:\[(\d+)\])/y;

export function parsePath(path: string): PathStep[] {
   const steps: PathStep[] = [];
   STEP_RE.lastIndex = 0;
   while (STEP_RE.lastIndex < path.length) {
      const start = STEP_RE.lastIndex;
      const m = STEP_RE.exec(path);
      if (!m)
         throw new TypeMismatchError(`malformed path '${path}' at character ${start}`);
      if (m[1] !== undefined)
         steps.push({name: m[1]});
      else
         steps.push({index: Number(m[2])});
   }
   return steps;
}

/**
 * Follows a symbolic path such as `.settings.squelch` or `memory[12].freq`
 * from `root`. A leading dot is optional.
 */
export function getPath(root: BoundElement, path: string): BoundElement {
   let el = root;
   for (const step of parsePath(path)) {
      if ("name" in step) {
         if (el.kind !== "record")
            throw new TypeMismatchError(`${el.path || "(root)"}: cannot take field '${step.name}' of ${el.kind}`);
         el = el.field(step.name);
      } else {
         if (el.kind !== "array")
            throw new TypeMismatchError(`${el.path || "(root)"}: cannot index ${el.kind}`);
         el = el.at(step.index);
      }
   }
   return el;
}
