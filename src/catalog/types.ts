export interface Product {
  readonly name: string;
  /** USD, two decimal places when rendered */
  readonly price: number;
  readonly description: string;
}

export interface CatalogFile {
  products: Product[];
}
