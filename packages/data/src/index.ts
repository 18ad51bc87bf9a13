export {
	buildPriceSeries,
	tailPriceSeries,
} from "./priceSeries";
export { closedCandlePoints } from "./utils/ccxtMapper";
