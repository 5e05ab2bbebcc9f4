import { ScaffoldInput } from "../../../domain/model/ScaffoldOptions";
import { ScaffoldResult } from "../../../domain/model/ScaffoldResult";

/**
 * Puerto primario: construye en disco el árbol descrito en un documento
 */
export interface ScaffoldUseCase {
  execute(input: ScaffoldInput): ScaffoldResult;
}
