export { DatabaseError } from "./database.error";
export { InvalidRelationshipContractError } from "./invalid-relationship-contract.error";
export { MissingDataSourceError } from "./missing-data-source.error";
export { ModelNotFoundError } from "./model-not-found.error";
export { RelationNotFoundError } from "./relation-not-found.error";
