export { ScryptPasswordHasher } from "./password-hasher.js";
