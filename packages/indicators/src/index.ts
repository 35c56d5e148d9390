export { cumulativeProduct, momentum, pctChange, simpleReturns } from "./returns";
